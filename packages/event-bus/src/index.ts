export * from './core';
export * from './eventBus';
