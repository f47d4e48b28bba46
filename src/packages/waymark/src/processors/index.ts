export * from './commandExecutor';
export * from './workflowOutputProcessor';
