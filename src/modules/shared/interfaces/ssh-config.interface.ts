/**
 * SSH Configuration Interface
 * Connection settings for a single remote host
 */
export interface SshConfig {
  /** SSH server hostname or IP address */
  host: string;

  /** SSH port (default: 22) */
  port?: number;

  /** SSH username for authentication */
  username: string;

  /** Password for password-based authentication (optional) */
  password?: string;

  /** Path to private key file for key-based authentication (optional) */
  privateKey?: string;
}

/**
 * Session tuning read from configuration (`ssh.*`)
 */
export interface SshSessionOptions {
  /** Connection ready timeout in milliseconds (default: 30000) */
  readyTimeout: number;

  /** Keepalive interval in milliseconds (default: 10000) */
  keepaliveInterval: number;

  /** Maximum unanswered keepalives before disconnect (default: 3) */
  keepaliveCountMax: number;
}
