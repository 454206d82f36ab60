// =====================================================
// Trivia Duel Shared Types
// =====================================================

export * from './api.types';
export * from './tier.types';
export * from './match.types';
export * from './matchmaking.types';
export * from './protocol.types';
