export { BackupService, hashTree, hashContent } from './backup.service';
