export { UpdateCoordinator, ALREADY_RUNNING_MESSAGE, STOPPED_MESSAGE } from './update.coordinator';
export type { UpdateCoordinatorOptions, UpdateOutcome, StatusSink, MediaSource } from './types';
