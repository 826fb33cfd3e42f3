import { type Charset, checkCharsetName } from "./charset.ts";
import {
  CharsetRegistrationError,
  UnsupportedCharsetError,
} from "./charset_errors.ts";
import { ISO_8859_1, US_ASCII } from "./latin1_family.ts";
import { UTF_8 } from "./utf8.ts";

/**
 * Case-insensitive lookup of charsets by canonical name or alias.
 *
 * The built-in charsets are always present; custom charsets may be
 * registered as long as none of their names is already taken.
 */
export class CharsetRegistry {
  #byName = new Map<string, Charset>();
  #charsets: Charset[] = [];

  constructor(charsets: readonly Charset[] = BUILT_IN_CHARSETS) {
    for (const charset of charsets) {
      this.register(charset);
    }
  }

  /**
   * Adds a charset under its canonical name and every alias.
   */
  public register(charset: Charset): void {
    const names = [charset.name(), ...charset.aliases()];
    for (const name of names) {
      const owner = this.#byName.get(name.toLowerCase());
      if (owner) {
        throw new CharsetRegistrationError(name, owner.name());
      }
    }
    for (const name of names) {
      this.#byName.set(name.toLowerCase(), charset);
    }
    this.#charsets.push(charset);
  }

  /**
   * Looks a charset up by name or alias.
   * Throws IllegalCharsetNameError for malformed names and
   * UnsupportedCharsetError for unknown ones.
   */
  public forName(name: string): Charset {
    checkCharsetName(name);
    const charset = this.#byName.get(name.toLowerCase());
    if (!charset) {
      throw new UnsupportedCharsetError(name);
    }
    return charset;
  }

  public isSupported(name: string): boolean {
    checkCharsetName(name);
    return this.#byName.has(name.toLowerCase());
  }

  /** Every registered charset keyed by canonical name, in name order. */
  public availableCharsets(): Map<string, Charset> {
    const sorted = [...this.#charsets].sort((a, b) =>
      a.name().toLowerCase() < b.name().toLowerCase() ? -1 : 1
    );
    return new Map(sorted.map((charset) => [charset.name(), charset]));
  }

  public defaultCharset(): Charset {
    return UTF_8;
  }
}

const BUILT_IN_CHARSETS: readonly Charset[] = [US_ASCII, ISO_8859_1, UTF_8];

/** The process-wide registry holding the built-in charsets. */
export const charsets: CharsetRegistry = new CharsetRegistry();
