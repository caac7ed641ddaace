export { createMergeRequest, createMergeRequestParams, createMergeRequestSchema } from './create_merge_request.js';
export { rebaseOnStaging, rebaseOnStagingParams, rebaseOnStagingSchema } from './rebase_on_staging.js';
export { healthCheck, healthCheckParams, healthCheckSchema } from './health_check.js';
