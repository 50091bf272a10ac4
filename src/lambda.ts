import { resolveConfig } from './config.js';
import { RequestPipeline } from './pipeline/pipeline.js';
import { setLogLevel } from './utils/logger.js';
import { createHandler, type VoiceHandler } from './voice/handler.js';

// Resolved while the module loads: missing configuration fails the host's
// init phase instead of individual invocations.
const config = await resolveConfig();
setLogLevel(config.logLevel);

export const handler: VoiceHandler = createHandler(RequestPipeline.fromConfig(config));
