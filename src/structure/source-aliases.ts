import { substituteSlots } from '../query/template.js';

/**
 * Maps `{:name:}` slots in projection definitions and condition expressions
 * to the SQL aliases a particular query gives its sources.
 */
export class SourceAliases {
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(aliases: Record<string, string> = {}) {
    this.aliases = new Map(Object.entries(aliases));
  }

  get(name: string): string | undefined {
    return this.aliases.get(name);
  }

  /** Replaces known slots; slots with no alias are left as written. */
  apply(text: string): string {
    return substituteSlots(text, (name) => this.aliases.get(name)).text;
  }
}
