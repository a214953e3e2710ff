/**
 * Asset resolver — the set of package files a configuration depends on
 */

import type { ConfigDocument } from '@fieldsign/ipc';
import { ASSET_PREFIX } from '@fieldsign/ipc';

/**
 * Collect asset references from every media path that starts with `prefix`.
 *
 * Keys are the remainder after the prefix (the asset's identity inside the
 * package); values are the first original reference seen for that key.
 */
export function gatherAssets(doc: ConfigDocument, prefix: string = ASSET_PREFIX): Map<string, string> {
  const assets = new Map<string, string>();

  for (const media of Object.values(doc.media)) {
    const reference = media.path;
    if (!reference.startsWith(prefix)) continue;
    const relativePath = reference.slice(prefix.length);
    if (!relativePath || assets.has(relativePath)) continue;
    assets.set(relativePath, reference);
  }

  return assets;
}
