/**
 * Path rewriter — remaps package asset references to the live asset dir
 */

import type { ConfigDocument } from '@fieldsign/ipc';
import { ASSET_PREFIX } from '@fieldsign/ipc';

/** Signature shared by the default rewriter and injected replacements */
export type PathRewriter = (doc: ConfigDocument, newPrefix: string) => ConfigDocument;

/** Forward slashes only, no repeated separators */
export function toPortable(value: string): string {
  return value.replace(/\\/g, '/').replace(/\/{2,}/g, '/');
}

/**
 * Rewrite a single path. Returns null when the path does not carry `oldPrefix`.
 */
export function rewritePath(value: string, newPrefix: string, oldPrefix: string = ASSET_PREFIX): string | null {
  if (!value.startsWith(oldPrefix)) return null;
  const remainder = value.slice(oldPrefix.length);
  const prefix = toPortable(newPrefix).replace(/\/+$/, '');
  return toPortable(prefix ? `${prefix}/${remainder}` : remainder);
}

/**
 * Return an independent copy of `doc` with every asset-prefixed media path
 * moved under `newPrefix`. Other paths are copied unchanged.
 */
export function rewritePaths(doc: ConfigDocument, newPrefix: string, oldPrefix: string = ASSET_PREFIX): ConfigDocument {
  const copy = structuredClone(doc);

  for (const media of Object.values(copy.media)) {
    const rewritten = rewritePath(media.path, newPrefix, oldPrefix);
    if (rewritten !== null) media.path = rewritten;
  }

  return copy;
}

/**
 * Media paths that rewriting leaves untouched, keyed by media name
 */
export function listPassThroughPaths(doc: ConfigDocument, prefix: string = ASSET_PREFIX): Array<{ media: string; path: string }> {
  return Object.entries(doc.media)
    .filter(([, media]) => !media.path.startsWith(prefix))
    .map(([name, media]) => ({ media: name, path: media.path }));
}
