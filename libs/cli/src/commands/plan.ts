/**
 * Plan command
 *
 * Dry run of an update package: which assets would be copied, which are
 * missing, and how media paths would be rewritten. Nothing is written.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { Command } from 'commander';
import { CONFIG_FILE, PACKAGE_ASSETS_DIR, DEFAULT_ENGINE_DIR, DEFAULT_ASSET_SUBDIR } from '@fieldsign/ipc';
import {
  validateConfig,
  gatherAssets,
  rewritePath,
  listPassThroughPaths,
  describeError,
} from '@fieldsign/updater';

export interface PlannedAsset {
  relativePath: string;
  source: string;
  present: boolean;
}

export interface UpdatePlan {
  packageDir: string;
  valid: boolean;
  error?: string;
  assets: PlannedAsset[];
  rewrites: Array<{ media: string; from: string; to: string }>;
  passThrough: Array<{ media: string; path: string }>;
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch {
    return false;
  }
}

export async function planUpdate(
  packageDir: string,
  assetPrefix: string = `${DEFAULT_ENGINE_DIR}/${DEFAULT_ASSET_SUBDIR}`,
): Promise<UpdatePlan> {
  const plan: UpdatePlan = { packageDir, valid: false, assets: [], rewrites: [], passThrough: [] };

  let doc: unknown;
  try {
    doc = JSON.parse(await fs.readFile(path.join(packageDir, CONFIG_FILE), 'utf-8'));
  } catch (err) {
    plan.error = `Cannot read ${CONFIG_FILE}: ${describeError(err)}`;
    return plan;
  }

  const result = validateConfig(doc);
  if (!result.valid) {
    plan.error = result.error.message;
    return plan;
  }
  plan.valid = true;

  const assetsDir = path.join(packageDir, PACKAGE_ASSETS_DIR);
  for (const relativePath of gatherAssets(result.config).keys()) {
    const source = path.join(assetsDir, ...relativePath.split(/[\\/]+/).filter(Boolean));
    plan.assets.push({ relativePath, source, present: await isFile(source) });
  }

  for (const [name, media] of Object.entries(result.config.media)) {
    const to = rewritePath(media.path, assetPrefix);
    if (to !== null) plan.rewrites.push({ media: name, from: media.path, to });
  }
  plan.passThrough = listPassThroughPaths(result.config);

  return plan;
}

function printPlan(plan: UpdatePlan): void {
  console.log(`Update plan for ${plan.packageDir}`);
  console.log('='.repeat(17 + plan.packageDir.length));

  if (!plan.valid) {
    console.log(`✗ ${plan.error}`);
    return;
  }

  console.log(`\nAssets (${plan.assets.length}):`);
  for (const asset of plan.assets) {
    console.log(`  ${asset.present ? '✓' : '✗ missing'} ${asset.relativePath}`);
  }

  console.log('\nRewritten paths:');
  for (const rewrite of plan.rewrites) {
    console.log(`  ${rewrite.media}: ${rewrite.from} → ${rewrite.to}`);
  }

  if (plan.passThrough.length > 0) {
    console.log('\nKept as is:');
    for (const entry of plan.passThrough) {
      console.log(`  ${entry.media}: ${entry.path}`);
    }
  }
}

export function createPlanCommand(): Command {
  return new Command('plan')
    .description('Show what an update package would change (dry run)')
    .argument('<packageDir>', 'Update package directory (holding config.json and assets/)')
    .option('-p, --prefix <prefix>', 'Live asset prefix', `${DEFAULT_ENGINE_DIR}/${DEFAULT_ASSET_SUBDIR}`)
    .option('-j, --json', 'Output as JSON')
    .action(async (packageDir: string, options: { prefix: string; json?: boolean }) => {
      const plan = await planUpdate(packageDir, options.prefix);
      if (options.json) {
        console.log(JSON.stringify(plan, null, 2));
      } else {
        printPlan(plan);
      }
      if (!plan.valid || plan.assets.some((asset) => !asset.present)) process.exitCode = 1;
    });
}
