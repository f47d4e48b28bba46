export * from './afterCommit';
export * from './expectedPosition';
export * from './inMemoryWorkflowMessageStore';
export * from './workflowMessage';
export * from './workflowMessageStore';
