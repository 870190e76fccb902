export * from './core';
export * from './transfer';
