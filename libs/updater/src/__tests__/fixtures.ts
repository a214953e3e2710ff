/**
 * Shared builders for updater tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export function sampleConfig(): Record<string, unknown> {
  return {
    buttons: {
      red: { value: 17, mode: 'press' },
      blue: { value: 27, mode: 'toggle' },
    },
    media: {
      welcome: { mode: 'image_still', path: 'assets/welcome/frame.png', button: 'red' },
      promo: { mode: 'image_flash', path: 'assets/promo.png', button: ['red', 'blue'], hold_time: 2 },
      ticker: { mode: 'scroll_text', path: 'texts/ticker.txt' },
    },
    actions: {
      reload: { mode: 'load_config', button: ['red', 'blue'], hold_time: 3 },
      screen: { mode: 'hdmi_control', button: 'blue' },
    },
    settings: { debounce_time: 0.2, default_media_name: 'welcome' },
  };
}

export function writeFile(target: string, content: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
}

/**
 * Build `<mountRoot>/signage_update_package/` with config.json and the given
 * asset files (relative to assets/).
 */
export function writePackage(
  mountRoot: string,
  config: unknown,
  assets: Record<string, string>,
): string {
  const root = path.join(mountRoot, 'signage_update_package');
  fs.mkdirSync(path.join(root, 'assets'), { recursive: true });
  writeFile(path.join(root, 'config.json'), typeof config === 'string' ? config : JSON.stringify(config));
  for (const [relativePath, content] of Object.entries(assets)) {
    writeFile(path.join(root, 'assets', relativePath), content);
  }
  return root;
}

/** Map of posix relative path → file content for every file under dir */
export function readTree(dir: string): Record<string, string> {
  const result: Record<string, string> = {};
  if (!fs.existsSync(dir)) return result;
  const walk = (current: string): void => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else {
        result[path.relative(dir, full).split(path.sep).join('/')] = fs.readFileSync(full, 'utf-8');
      }
    }
  };
  walk(dir);
  return result;
}
