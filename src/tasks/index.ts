export { TaskQueue } from "./task-queue.js";
export { loadTaskFile } from "./task-file.js";
export { ResultRecorder, fileTimestamp, type ResultRecorderOptions } from "./result-recorder.js";
export { TaskRunner, type TaskRunnerDeps, type Write } from "./task-runner.js";
