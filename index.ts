export * from './types';
export * from './errors';
export { TASK_RANGE_PATTERN, decodeTask, encodeTask } from './task';
export { parseStorageValue, formatStorageValue } from './storageValue';
export { ResourceList } from './resources';
export {
    JobList, type JobPredicate, filterJobs, isJobRunning, isExpandedTask, doesJobContainTaskRange,
    extrapolateTasksToJobs, serializeJob,
} from './jobList';
export { parseJobInfo, decodeJob, buildJobListXml, type RawJob } from './qstatParser';
export {
    parseSchedulerTime, newBeforeSubmitTimeFilter, newAfterSubmitTimeFilter,
    newBetweenSubmitTimeFilter, stateFilter, ownerFilter,
} from './filters';
export { type GridEngineConfig, GridEngineConfigSchema, DEFAULT_QSTAT_COMMAND, loadConfig } from './config';
export { GridEngineService } from './gridEngineService';
export { logger } from './logger';
