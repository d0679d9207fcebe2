export { now, sleep, sleepUntil } from "./clock";
export { Deferred } from "./Deferred";
export { Condition } from "./Condition";
export { AsyncQueue, QUEUE_TIMEOUT } from "./AsyncQueue";
export { BackgroundTask, type TaskState } from "./BackgroundTask";
