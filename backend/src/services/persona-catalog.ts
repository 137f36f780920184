import { DEFAULT_PERSONA_STYLE, DEFAULT_PERSONA_STYLES } from "@incident-relay/shared";

/**
 * Persona label → style descriptor. Append-only: entries are added the first
 * time a persona is seen and never removed. Owned by one worker instance.
 */
export class PersonaCatalog {
  private readonly styles: Map<string, string>;

  public constructor(
    initial: Readonly<Record<string, string>> = DEFAULT_PERSONA_STYLES,
    private readonly defaultStyle: string = DEFAULT_PERSONA_STYLE
  ) {
    this.styles = new Map(Object.entries(initial));
  }

  public has(persona: string): boolean {
    return this.styles.has(persona);
  }

  /** Returns false when the persona already had a style. */
  public register(persona: string, style: string = this.defaultStyle): boolean {
    if (this.styles.has(persona)) {
      return false;
    }

    this.styles.set(persona, style);
    return true;
  }

  /** Style for the persona, registering the default descriptor on first use. */
  public styleFor(persona: string): string {
    this.register(persona);
    return this.styles.get(persona) ?? this.defaultStyle;
  }

  public get size(): number {
    return this.styles.size;
  }

  public snapshot(): Record<string, string> {
    return Object.fromEntries(this.styles);
  }
}
