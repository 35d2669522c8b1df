export * from './deployment-step.error';
