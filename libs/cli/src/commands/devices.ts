/**
 * Devices command
 *
 * Lists partitions of removable drives as the updater would see them.
 */

import { Command } from 'commander';
import { LsblkProbe, findRemovablePartitions } from '@fieldsign/updater';

export function createDevicesCommand(): Command {
  return new Command('devices')
    .description('List removable partitions')
    .option('-j, --json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      const partitions = findRemovablePartitions(await new LsblkProbe().list());

      if (options.json) {
        console.log(JSON.stringify(partitions, null, 2));
        return;
      }

      if (partitions.mounted.length === 0 && partitions.unmounted.length === 0) {
        console.log('No removable partitions found');
        return;
      }
      for (const entry of partitions.mounted) {
        console.log(`${entry.device}  mounted at ${entry.mountpoint}`);
      }
      for (const device of partitions.unmounted) {
        console.log(`${device}  not mounted`);
      }
    });
}
