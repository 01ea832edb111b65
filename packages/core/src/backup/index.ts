export { BackupManager } from './backup-manager.js';
export type { BackupInfo } from './backup-manager.js';
