/**
 * How many simultaneous notes a passthrough output may carry.
 * - "monophonic": at most one open note
 * - "polyphonic": unbounded
 */
export type Texture = "monophonic" | "polyphonic";
