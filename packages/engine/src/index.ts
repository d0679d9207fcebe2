// Errors
export * from "./errors";

// Async primitives
export * from "./concurrency";

// Signals and the hub
export * from "./hub";

// Capture and playback
export * from "./capture";
export * from "./playback";
export * from "./metronome";

// Sequence utilities
export * from "./sequences";

// Song structure
export * from "./song";

// Interaction loop
export * from "./interaction";

// Harmonizer
export * from "./harmonizer";

// Generators
export * from "./generator";
