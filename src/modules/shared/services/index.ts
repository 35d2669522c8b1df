/**
 * Shared Services Export
 */

export * from './ssh-command.service';
export * from './ssh-remote-channel';
