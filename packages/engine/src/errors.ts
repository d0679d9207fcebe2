/**
 * Errors raised synchronously to the caller of a hub component.
 *
 * - ConfigurationError: invalid arguments at construction/registration time
 * - ProtocolStateError: a call that is invalid in the component's current state
 */

export class MidiHubError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends MidiHubError {}

export class ProtocolStateError extends MidiHubError {}

/**
 * Throws unless exactly one of the named options is defined.
 */
export function requireExactlyOne(
  options: Record<string, unknown>,
  operation: string
): void {
  const names = Object.keys(options);
  const given = names.filter((name) => options[name] !== undefined);
  if (given.length !== 1) {
    throw new ConfigurationError(
      `Exactly one of ${names.map((n) => `\`${n}\``).join(" or ")} must be provided to \`${operation}\` call.`
    );
  }
}
