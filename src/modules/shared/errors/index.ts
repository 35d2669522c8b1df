export * from './remote-operation.error';
