/**
 * Configuration Factory
 * Used by ConfigModule to load environment variables
 * Values are read through ConfigService (e.g. `transfer.blockSize`)
 */
const intFromEnv = (name: string, fallback: number): number =>
  parseInt(process.env[name] ?? '', 10) || fallback;

export default () => ({
  // Default SSH target for the CLI
  ssh: {
    host: process.env.SSH_HOST || undefined,
    port: intFromEnv('SSH_PORT', 22),
    username: process.env.SSH_USERNAME || undefined,
    password: process.env.SSH_PASSWORD || undefined,
    privateKey: process.env.SSH_PRIVATE_KEY || undefined,
    readyTimeout: intFromEnv('SSH_READY_TIMEOUT', 30000),
    keepaliveInterval: intFromEnv('SSH_KEEPALIVE_INTERVAL', 10000),
    keepaliveCountMax: intFromEnv('SSH_KEEPALIVE_COUNT_MAX', 3),
  },

  // Chunked push settings
  transfer: {
    blockSize: intFromEnv('TRANSFER_BLOCK_SIZE', 1024 * 1024),
    progressInterval: intFromEnv('TRANSFER_PROGRESS_INTERVAL', 5000),
  },

  // Two-tier deployment defaults
  deployment: {
    location: process.env.DEPLOY_LOCATION || 'West Europe',
    webServerPackage: process.env.DEPLOY_WEB_SERVER_PACKAGE || 'nginx',
    databaseInstallerRemotePath:
      process.env.DEPLOY_DATABASE_INSTALLER_REMOTE_PATH ||
      'installers/database.deb',
    dataDiskDevice: process.env.DEPLOY_DATA_DISK_DEVICE || '/dev/sdc',
    dataMount: process.env.DEPLOY_DATA_MOUNT || '/srv/data',
  },
});
