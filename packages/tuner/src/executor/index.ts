export { build, type BuildOptions } from "./build.js";

export { assembleEvents, type DispatchContext } from "./dispatch.js";

export { innerVerbosity, runEvent, type EventContext } from "./event.js";

export {
	ProgressTracker,
	type ProgressHandler,
	type ProgressTrackerOptions,
	type TuningProgressEvent,
} from "./progress.js";

export { EvaluatorPool } from "./worker-pool.js";
