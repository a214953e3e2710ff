import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { PackageLocator } from '../package';
import { writeFile, writePackage, sampleConfig } from './fixtures';

describe('PackageLocator', () => {
  let mountRoot: string;
  const locator = new PackageLocator();

  beforeEach(() => {
    mountRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'package-test-'));
  });

  afterEach(() => {
    try { fs.rmSync(mountRoot, { recursive: true }); } catch { /* */ }
  });

  it('finds a package with config.json and assets/', async () => {
    const root = writePackage(mountRoot, sampleConfig(), {});
    const pkg = await locator.find(mountRoot);
    expect(pkg).toEqual({
      root,
      configPath: path.join(root, 'config.json'),
      assetsDir: path.join(root, 'assets'),
    });
  });

  it('returns null when the package directory is absent', async () => {
    expect(await locator.find(mountRoot)).toBeNull();
  });

  it('returns null when config.json is missing', async () => {
    fs.mkdirSync(path.join(mountRoot, 'signage_update_package', 'assets'), { recursive: true });
    expect(await locator.find(mountRoot)).toBeNull();
  });

  it('returns null when assets is a file', async () => {
    writeFile(path.join(mountRoot, 'signage_update_package', 'config.json'), '{}');
    writeFile(path.join(mountRoot, 'signage_update_package', 'assets'), 'not a directory');
    expect(await locator.find(mountRoot)).toBeNull();
  });

  it('returns null for a mount path that does not exist', async () => {
    expect(await locator.find(path.join(mountRoot, 'gone'))).toBeNull();
  });

  it('honours a custom package directory name', async () => {
    const custom = new PackageLocator('kiosk_pkg');
    fs.mkdirSync(path.join(mountRoot, 'kiosk_pkg', 'assets'), { recursive: true });
    writeFile(path.join(mountRoot, 'kiosk_pkg', 'config.json'), '{}');
    const pkg = await custom.find(mountRoot);
    expect(pkg?.root).toBe(path.join(mountRoot, 'kiosk_pkg'));
  });
});
