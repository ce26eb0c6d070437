/**
 * Argument Registry
 *
 * Registration table mapping flag names to descriptions, in the order the
 * names were first registered.
 */

export interface ArgumentSpec {
  /** Exact flag token, e.g. "--print-stuff" */
  readonly name: string;
  /** Free text shown on the help screen */
  readonly description: string;
}

/** What a call to register() did */
export type RegistrationOutcome = 'added' | 'replaced';

export class ArgumentRegistry {
  private readonly entries = new Map<string, ArgumentSpec>();

  /**
   * Register a flag. Registering a name twice replaces its description but
   * keeps the position from the first registration.
   */
  register(name: string, description: string): RegistrationOutcome {
    const outcome: RegistrationOutcome = this.entries.has(name) ? 'replaced' : 'added';
    // Map.set on an existing key keeps its insertion position
    this.entries.set(name, Object.freeze({ name, description }));
    return outcome;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Entries in registration order */
  list(): ArgumentSpec[] {
    return [...this.entries.values()];
  }
}
