export * from './transfer-options.interface';
