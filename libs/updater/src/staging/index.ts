export { StagingArea } from './staging-area';
