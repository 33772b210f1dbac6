export { assert, describe, test } from "./nodeTest.js";
export { createManualTimers, type ManualTimers } from "./timers.js";
export { createRecorder, type Recorder } from "./recorder.js";
