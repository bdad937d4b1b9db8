export * from './actions/registry';
export * from './actions/types';
export * from './audit/blobStore';
export * from './audit/middleware';
export * from './audit/redaction';
export * from './config';
export * from './errors';
export * from './gateway';
export * from './learning/engine';
export * from './learning/keywords';
export * from './learning/types';
export * from './metrics';
export * from './planning/dag';
export * from './planning/planBuilder';
export * from './planning/proposer';
export * from './planning/schema';
export * from './planning/types';
export * from './runtime';
export * from './workflow/context';
export * from './workflow/orchestrator';
export * from './workflow/state';
export * from './workflow/stepRunner';
