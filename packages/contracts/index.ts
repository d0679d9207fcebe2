export * from "./core/time";

// MIDI messages (protocol-level)
export * from "./midi/messages";
export * from "./midi/texture";

// Structured note data
export * from "./sequence/sequence";

export * from "./signals/signals";

export * from "./ports/ports";

export * from "./song/song";

export * from "./generator/generator";

export * from "./interaction/state";
