export { rewritePaths, rewritePath, listPassThroughPaths, toPortable } from './path-rewriter';
export type { PathRewriter } from './path-rewriter';
