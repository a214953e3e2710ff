import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { StagingArea } from '../staging';
import { NodeFileOps } from '../fs/file-ops';
import { resolveLiveLayout } from '../layout';
import { AssetMissingError, IOFailureError } from '../errors';
import { writeFile } from './fixtures';

describe('StagingArea', () => {
  let tmpDir: string;
  let packageAssets: string;
  let staging: StagingArea;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'staging-test-'));
    packageAssets = path.join(tmpDir, 'usb', 'assets');
    fs.mkdirSync(packageAssets, { recursive: true });
    staging = new StagingArea(resolveLiveLayout({ appRoot: path.join(tmpDir, 'app') }), new NodeFileOps());
  });

  afterEach(() => {
    try { fs.rmSync(tmpDir, { recursive: true }); } catch { /* */ }
  });

  it('mirrors the live asset directory under the staging root', () => {
    const root = path.join(tmpDir, 'app', '.update_staging');
    expect(staging.root).toBe(root);
    expect(staging.assetsDir).toBe(path.join(root, 'engine', 'image_sets'));
    expect(staging.configFile).toBe(path.join(root, 'config.json.tmp'));
  });

  it('reset clears leftovers and creates the asset tree', async () => {
    writeFile(path.join(staging.root, 'stale.txt'), 'old');
    await staging.reset();
    expect(fs.existsSync(path.join(staging.root, 'stale.txt'))).toBe(false);
    expect(fs.statSync(staging.assetsDir).isDirectory()).toBe(true);
  });

  it('copyAsset keeps the relative path', async () => {
    writeFile(path.join(packageAssets, 'set0', 'a.png'), 'A');
    await staging.reset();
    const dest = await staging.copyAsset('set0/a.png', packageAssets);
    expect(dest).toBe(path.join(staging.assetsDir, 'set0', 'a.png'));
    expect(fs.readFileSync(dest, 'utf-8')).toBe('A');
  });

  it('copyAsset accepts backslash separators', async () => {
    writeFile(path.join(packageAssets, 'set0', 'b.png'), 'B');
    await staging.reset();
    const dest = await staging.copyAsset('set0\\b.png', packageAssets);
    expect(fs.readFileSync(dest, 'utf-8')).toBe('B');
  });

  it('copyAsset reports a missing source', async () => {
    await staging.reset();
    const error = await staging.copyAsset('nope.png', packageAssets).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AssetMissingError);
    expect((error as AssetMissingError).path).toBe(path.join(packageAssets, 'nope.png'));
  });

  it('copyAsset accepts file names that start with two dots', async () => {
    writeFile(path.join(packageAssets, '..logo.png'), 'L');
    await staging.reset();
    const dest = await staging.copyAsset('..logo.png', packageAssets);
    expect(dest).toBe(path.join(staging.assetsDir, '..logo.png'));
    expect(fs.readFileSync(dest, 'utf-8')).toBe('L');
  });

  it('copyAsset refuses paths that leave the package assets', async () => {
    writeFile(path.join(tmpDir, 'usb', 'secret.txt'), 'S');
    await staging.reset();
    await expect(staging.copyAsset('../secret.txt', packageAssets)).rejects.toThrow(AssetMissingError);
  });

  it('writes and reads back the staged config', async () => {
    await staging.reset();
    const doc = { buttons: {}, media: {}, actions: {}, settings: { poll_interval: 0.1 } };
    await staging.writeConfig(doc);
    expect(fs.readFileSync(staging.configFile, 'utf-8')).toBe(`${JSON.stringify(doc, null, 2)}\n`);
    expect(await staging.readConfig()).toEqual(doc);
  });

  it('readConfig reports unparseable content as an IO failure', async () => {
    writeFile(staging.configFile, '{ nope');
    await expect(staging.readConfig()).rejects.toThrow(IOFailureError);
  });

  it('discard removes the staging root', async () => {
    await staging.reset();
    await staging.discard();
    expect(fs.existsSync(staging.root)).toBe(false);
  });
});
