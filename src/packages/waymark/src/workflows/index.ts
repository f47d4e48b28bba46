export * from './handleWorkflow';
export * from './translate';
export * from './workflow';
export * from './workflowOrchestrator';
export * from './workflowStreamMessage';
