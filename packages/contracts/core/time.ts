export type Seconds = number;   // absolute wall-clock seconds (Date.now() / 1000) or durations
export type Qpm = number;       // quarter notes per minute
