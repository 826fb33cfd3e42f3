/**
 * Errors raised when naming, looking up or registering charsets.
 */

export class IllegalCharsetNameError extends Error {
  /** The rejected name. */
  public readonly charsetName: string;

  constructor(charsetName: string) {
    super(`Illegal charset name: "${charsetName}"`);
    this.name = "IllegalCharsetNameError";
    this.charsetName = charsetName;
  }
}

export class UnsupportedCharsetError extends Error {
  /** The name that matched no registered charset. */
  public readonly charsetName: string;

  constructor(charsetName: string) {
    super(`Unsupported charset: "${charsetName}"`);
    this.name = "UnsupportedCharsetError";
    this.charsetName = charsetName;
  }
}

export class CharsetRegistrationError extends Error {
  /** The name or alias that is already taken. */
  public readonly charsetName: string;
  /** Canonical name of the charset that already owns it. */
  public readonly registeredBy: string;

  constructor(charsetName: string, registeredBy: string) {
    super(
      `Charset name "${charsetName}" is already registered by ${registeredBy}`,
    );
    this.name = "CharsetRegistrationError";
    this.charsetName = charsetName;
    this.registeredBy = registeredBy;
  }
}
