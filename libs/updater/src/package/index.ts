export { PackageLocator } from './package-locator';
export type { UpdatePackage } from './package-locator';
