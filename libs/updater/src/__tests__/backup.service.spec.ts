/**
 * BackupService tests — real filesystem with tmp dirs
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { LiveLayout } from '@fieldsign/ipc';
import { BackupService, hashTree } from '../backup';
import { resolveLiveLayout } from '../layout';
import { writeFile, readTree } from './fixtures';

describe('BackupService', () => {
  let tmpDir: string;
  let layout: LiveLayout;
  let service: BackupService;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'backup-test-'));
    layout = resolveLiveLayout({ appRoot: tmpDir });
    service = new BackupService(layout);
    writeFile(layout.configFile, '{"live":1}');
    writeFile(path.join(layout.assetsDir, 'a.png'), 'A');
    writeFile(path.join(layout.assetsDir, 'set1', 'b.png'), 'B');
  });

  afterEach(() => {
    try { fs.rmSync(tmpDir, { recursive: true }); } catch { /* */ }
  });

  it('create copies config and assets under the backup directory', async () => {
    const manifest = await service.create('/media/usb/signage_update_package');

    expect(service.configBackup).toBe(path.join(tmpDir, '.update_backup', 'config.json.bak'));
    expect(service.assetsBackup).toBe(path.join(tmpDir, '.update_backup', 'image_sets.bak'));
    expect(fs.readFileSync(service.configBackup, 'utf-8')).toBe('{"live":1}');
    expect(readTree(service.assetsBackup)).toEqual({ 'a.png': 'A', 'set1/b.png': 'B' });
    expect(manifest.hadConfig).toBe(true);
    expect(manifest.hadAssets).toBe(true);
    expect(manifest.assetsHash).toBe(await hashTree(layout.assetsDir));
    expect(await service.read()).toEqual(manifest);
  });

  it('create replaces the previous snapshot', async () => {
    await service.create();
    fs.rmSync(path.join(layout.assetsDir, 'a.png'));
    await service.create();
    expect(readTree(service.assetsBackup)).toEqual({ 'set1/b.png': 'B' });
  });

  it('records absent live items', async () => {
    fs.rmSync(path.dirname(layout.configFile), { recursive: true });
    const manifest = await service.create();
    expect(manifest.hadConfig).toBe(false);
    expect(manifest.hadAssets).toBe(false);
    expect(fs.existsSync(service.configBackup)).toBe(false);
  });

  it('restore brings back the snapshot byte for byte', async () => {
    await service.create();
    writeFile(layout.configFile, '{"live":2}');
    fs.rmSync(path.join(layout.assetsDir, 'a.png'));
    writeFile(path.join(layout.assetsDir, 'new.png'), 'N');

    await service.restore();

    expect(fs.readFileSync(layout.configFile, 'utf-8')).toBe('{"live":1}');
    expect(readTree(layout.assetsDir)).toEqual({ 'a.png': 'A', 'set1/b.png': 'B' });
  });

  it('restore removes live items that did not exist at snapshot time', async () => {
    fs.rmSync(path.dirname(layout.configFile), { recursive: true });
    await service.create();
    writeFile(layout.configFile, '{"live":3}');
    writeFile(path.join(layout.assetsDir, 'x.png'), 'X');

    await service.restore();

    expect(fs.existsSync(layout.configFile)).toBe(false);
    expect(fs.existsSync(layout.assetsDir)).toBe(false);
  });

  it('restore fails when there is no snapshot', async () => {
    await expect(service.restore()).rejects.toThrow('No backup snapshot found');
  });

  it('restore fails when the snapshot was tampered with', async () => {
    await service.create();
    fs.writeFileSync(path.join(service.assetsBackup, 'a.png'), 'tampered');
    await expect(service.restore()).rejects.toThrow('do not match the snapshot');
  });

  it('read returns null for a corrupt manifest', async () => {
    await service.create();
    fs.writeFileSync(service.manifestPath, '{"createdAt": 5}');
    expect(await service.read()).toBeNull();
  });
});

describe('hashTree', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hash-test-'));
  });

  afterEach(() => {
    try { fs.rmSync(tmpDir, { recursive: true }); } catch { /* */ }
  });

  it('depends on names and content but not on empty directories', async () => {
    writeFile(path.join(tmpDir, 'one', 'a.txt'), 'same');
    writeFile(path.join(tmpDir, 'two', 'a.txt'), 'same');
    fs.mkdirSync(path.join(tmpDir, 'two', 'empty'));
    writeFile(path.join(tmpDir, 'three', 'b.txt'), 'same');

    const one = await hashTree(path.join(tmpDir, 'one'));
    expect(await hashTree(path.join(tmpDir, 'two'))).toBe(one);
    expect(await hashTree(path.join(tmpDir, 'three'))).not.toBe(one);
  });
});
