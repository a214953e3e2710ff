export { gatherAssets } from './asset-resolver';
