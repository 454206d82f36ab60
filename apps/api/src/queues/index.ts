// =====================================================
// Queue Module Exports
// =====================================================

export * from './connection';
export * from './settlement-reconcile.queue';
export * from './match-sweep.queue';
