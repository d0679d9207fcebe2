/**
 * MidiSignal
 *
 * A compiled message matcher. Built either from an exact message (every
 * field but time must match) or from a spec of field values, where omitted
 * fields are wildcards and the type may be inferred from the fields given.
 *
 * Used for one-shot hub waits, persistent hub callbacks, captor stop
 * conditions and captor iteration triggers.
 */

import type {
  MidiMessage,
  MidiSignalField,
  MidiSignalSpec,
  SignalMessageType,
} from "@antiphon/contracts";
import { formatMessage } from "@antiphon/contracts";

import { ConfigurationError } from "../errors";

const FIELD_NAMES: readonly MidiSignalField[] = ["channel", "note", "velocity", "control", "value"];

/** Fields each signal type accepts, in canonical rendering order. */
const VALID_FIELDS: Record<SignalMessageType, readonly MidiSignalField[]> = {
  note_on: ["channel", "note", "velocity"],
  note_off: ["channel", "note", "velocity"],
  control_change: ["channel", "control", "value"],
};

const SIGNAL_TYPES: readonly SignalMessageType[] = ["note_on", "note_off", "control_change"];

type SignalFields = Partial<Record<MidiSignalField, number>>;

type Matcher =
  | { kind: "message"; message: MidiMessage }
  | {
      kind: "fields";
      /** Explicit or single inferred type; null matches any compatible type */
      type: SignalMessageType | null;
      compatibleTypes: readonly SignalMessageType[];
      fields: SignalFields;
    };

function isSignalType(type: string): type is SignalMessageType {
  return SIGNAL_TYPES.some((t) => t === type);
}

function fieldValue(msg: MidiMessage, field: MidiSignalField): number | undefined {
  if (field === "channel") return msg.channel;
  switch (msg.type) {
    case "note_on":
    case "note_off":
      return field === "note" ? msg.note : field === "velocity" ? msg.velocity : undefined;
    case "control_change":
      return field === "control" ? msg.control : field === "value" ? msg.value : undefined;
    case "program_change":
      return undefined;
  }
}

function untimed(msg: MidiMessage): string {
  return formatMessage({ ...msg, time: undefined });
}

export class MidiSignal {
  private readonly matcher: Matcher;

  /** Canonical textual form; equal signals render equal keys */
  readonly key: string;

  private constructor(matcher: Matcher) {
    this.matcher = matcher;
    this.key = MidiSignal.render(matcher);
  }

  /**
   * Signal matching `msg` exactly, ignoring its timestamp.
   */
  static fromMessage(msg: MidiMessage): MidiSignal {
    return new MidiSignal({ kind: "message", message: { ...msg, time: undefined } });
  }

  /**
   * Signal matching every message compatible with `spec`.
   *
   * @throws ConfigurationError if the type is unknown, a field is invalid
   *   for the type, or no type can be inferred from the fields.
   */
  static fromSpec(spec: MidiSignalSpec): MidiSignal {
    const fields: SignalFields = {};
    const names: MidiSignalField[] = [];
    for (const name of FIELD_NAMES) {
      const value = spec[name];
      if (value !== undefined) {
        fields[name] = value;
        names.push(name);
      }
    }

    const type = spec.type;
    if (type !== undefined) {
      if (!isSignalType(type)) {
        throw new ConfigurationError(
          "The type of a MidiSignal must be either 'note_on', 'note_off', " +
            `'control_change' or undefined for wildcard matching. Got '${String(type)}'.`
        );
      }
      for (const name of names) {
        if (!VALID_FIELDS[type].includes(name)) {
          throw new ConfigurationError(`Invalid argument for type '${type}': ${name}`);
        }
      }
      return new MidiSignal({ kind: "fields", type, compatibleTypes: [type], fields });
    }

    const inferred = names.length === 0
      ? []
      : SIGNAL_TYPES.filter((t) => names.every((name) => VALID_FIELDS[t].includes(name)));
    if (inferred.length === 0) {
      throw new ConfigurationError(
        `Could not infer a message type for set of given arguments: ${names.join(", ")}`
      );
    }
    return new MidiSignal({
      kind: "fields",
      type: inferred.length === 1 ? inferred[0] : null,
      compatibleTypes: inferred,
      fields,
    });
  }

  matches(msg: MidiMessage): boolean {
    const matcher = this.matcher;
    if (matcher.kind === "message") {
      return untimed(matcher.message) === untimed(msg);
    }
    if (!matcher.compatibleTypes.some((t) => t === msg.type)) {
      return false;
    }
    return FIELD_NAMES.every((name) => {
      const expected = matcher.fields[name];
      return expected === undefined || fieldValue(msg, name) === expected;
    });
  }

  /**
   * Build the message this signal describes. Unspecified fields are 0.
   *
   * @throws ConfigurationError if the type is not known.
   */
  toMessage(): MidiMessage {
    const matcher = this.matcher;
    if (matcher.kind === "message") return matcher.message;

    const { fields } = matcher;
    const channel = fields.channel ?? 0;
    switch (matcher.type) {
      case "note_on":
      case "note_off":
        return { type: matcher.type, channel, note: fields.note ?? 0, velocity: fields.velocity ?? 0 };
      case "control_change":
        return { type: matcher.type, channel, control: fields.control ?? 0, value: fields.value ?? 0 };
      case null:
        throw new ConfigurationError("Cannot build message if type is not inferrable.");
    }
  }

  toString(): string {
    return this.key;
  }

  private static render(matcher: Matcher): string {
    if (matcher.kind === "message") {
      return `${untimed(matcher.message)} time=*`;
    }
    const parts: string[] = [matcher.type ?? "*"];
    for (const name of VALID_FIELDS[matcher.compatibleTypes[0]]) {
      const value = matcher.fields[name];
      parts.push(`${name}=${value === undefined ? "*" : value}`);
    }
    return `${parts.join(" ")} time=*`;
  }
}

/** Accepts either a compiled signal or a spec to compile. */
export type SignalLike = MidiSignal | MidiSignalSpec;

export function toSignal(signal: SignalLike): MidiSignal {
  return signal instanceof MidiSignal ? signal : MidiSignal.fromSpec(signal);
}
