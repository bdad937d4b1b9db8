export const stateKeys = {
  workflow: (workflowId: string) => `workflow:${workflowId}`,
  resource: (resourceType: string, resourceId: string) => `resource:${resourceType}:${resourceId}`,
  resourcePrefix: (resourceType: string) => `resource:${resourceType}:`,
  conversation: (userId: string) => `context:${userId}`,
  actionCache: (actionName: string, fingerprint: string) => `cache:action:${actionName}:${fingerprint}`,
  pattern: (patternId: string) => `pattern:${patternId}`,
  patternPrefix: () => 'pattern:',
  feedback: (feedbackId: string) => `feedback:${feedbackId}`,
  audit: (auditId: string) => `audit:${auditId}`,
  blob: (blobKey: string) => `blob:${blobKey}`
} as const;

export const STATE_TTL_SECONDS = {
  workflowActive: 3_600,
  workflowCompleted: 86_400,
  resource: 86_400,
  conversation: 7_200,
  actionCache: 3_600
} as const;
