export * from './transfer.errors';
export { RemoteChannelError } from '../../shared/errors';
