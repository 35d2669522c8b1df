export * from './cloud-provider.interface';
export * from './deployment-plan.interface';
