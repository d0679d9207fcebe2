export type InteractionState = "idle" | "listening" | "responding";

/** Value written to the state controller when a state is reported. */
export const INTERACTION_STATE_VALUES: Record<InteractionState, number> = {
  idle: 0,
  listening: 1,
  responding: 2,
};

export type InstrumentRole = "melody" | "bass" | "drums";

export const INSTRUMENT_ROLES: readonly InstrumentRole[] = ["melody", "bass", "drums"];
