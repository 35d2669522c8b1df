export * from './ssh-config.interface';
export * from './remote-channel.interface';
