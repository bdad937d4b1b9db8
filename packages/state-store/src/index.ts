export * from './backends';
export * from './errors';
export * from './keys';
export * from './stateStore';
