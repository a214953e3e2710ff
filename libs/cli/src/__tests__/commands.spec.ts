/**
 * CLI command helpers — real files in tmp dirs
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { validateFile, planUpdate, collectStatus } from '../commands';
import { createProgram } from '../cli';

function writeFile(target: string, content: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
}

const PACKAGE_CONFIG = {
  buttons: { go: { value: 4, mode: 'press' } },
  media: {
    first: { mode: 'image_still', path: 'assets/one.png', button: 'go' },
    second: { mode: 'image_flash', path: 'assets/sub/two.png' },
    text: { mode: 'scroll_text', path: '/opt/texts/news.txt' },
  },
  actions: { update: { mode: 'load_config', button: 'go' } },
  settings: {},
};

describe('CLI commands', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-'));
  });

  afterEach(() => {
    try { fs.rmSync(tmpDir, { recursive: true }); } catch { /* */ }
  });

  describe('validateFile', () => {
    it('reports a valid config', async () => {
      const file = path.join(tmpDir, 'config.json');
      writeFile(file, JSON.stringify(PACKAGE_CONFIG));
      expect(await validateFile(file)).toEqual({ path: file, valid: true });
    });

    it('reports the first schema problem', async () => {
      const file = path.join(tmpDir, 'config.json');
      writeFile(file, JSON.stringify({ ...PACKAGE_CONFIG, actions: { update: { mode: 'reboot' } } }));
      const report = await validateFile(file);
      expect(report.valid).toBe(false);
      expect(report.field).toBe('actions.update.mode');
    });

    it('reports an unreadable file', async () => {
      const report = await validateFile(path.join(tmpDir, 'missing.json'));
      expect(report.valid).toBe(false);
      expect(report.field).toBe('(file)');
    });
  });

  describe('planUpdate', () => {
    it('lists assets, rewrites and pass-through paths', async () => {
      const packageDir = path.join(tmpDir, 'pkg');
      writeFile(path.join(packageDir, 'config.json'), JSON.stringify(PACKAGE_CONFIG));
      writeFile(path.join(packageDir, 'assets', 'one.png'), '1');

      const plan = await planUpdate(packageDir);

      expect(plan.valid).toBe(true);
      expect(plan.assets).toEqual([
        { relativePath: 'one.png', source: path.join(packageDir, 'assets', 'one.png'), present: true },
        { relativePath: 'sub/two.png', source: path.join(packageDir, 'assets', 'sub', 'two.png'), present: false },
      ]);
      expect(plan.rewrites).toEqual([
        { media: 'first', from: 'assets/one.png', to: 'engine/image_sets/one.png' },
        { media: 'second', from: 'assets/sub/two.png', to: 'engine/image_sets/sub/two.png' },
      ]);
      expect(plan.passThrough).toEqual([{ media: 'text', path: '/opt/texts/news.txt' }]);
    });

    it('honours a custom prefix', async () => {
      const packageDir = path.join(tmpDir, 'pkg');
      writeFile(path.join(packageDir, 'config.json'), JSON.stringify(PACKAGE_CONFIG));
      const plan = await planUpdate(packageDir, 'app/media');
      expect(plan.rewrites[0].to).toBe('app/media/one.png');
    });

    it('stops at an invalid config', async () => {
      const packageDir = path.join(tmpDir, 'pkg');
      writeFile(path.join(packageDir, 'config.json'), '{}');
      const plan = await planUpdate(packageDir);
      expect(plan.valid).toBe(false);
      expect(plan.error).toBe("Invalid configuration at 'buttons': Missing required section 'buttons'");
      expect(plan.assets).toEqual([]);
    });
  });

  describe('collectStatus', () => {
    it('describes a device without a snapshot', async () => {
      const configPath = path.join(tmpDir, 'app', 'engine', 'config.json');
      writeFile(configPath, JSON.stringify(PACKAGE_CONFIG));

      const status = await collectStatus(configPath);

      expect(status.layout.assetsDir).toBe(path.join(tmpDir, 'app', 'engine', 'image_sets'));
      expect(status.config.valid).toBe(true);
      expect(status.assetsPresent).toBe(false);
      expect(status.stagingLeftover).toBe(false);
      expect(status.snapshot).toBeNull();
    });

    it('notices a staging leftover', async () => {
      const configPath = path.join(tmpDir, 'app', 'engine', 'config.json');
      writeFile(configPath, JSON.stringify(PACKAGE_CONFIG));
      fs.mkdirSync(path.join(tmpDir, 'app', '.update_staging'));
      expect((await collectStatus(configPath)).stagingLeftover).toBe(true);
    });
  });

  describe('createProgram', () => {
    it('registers the operator commands', () => {
      const names = createProgram().commands.map((cmd) => cmd.name());
      expect(names).toEqual(['validate', 'plan', 'devices', 'status']);
    });
  });
});
