/**
 * Converter Registry
 * Maps format names to converters. Populated once, then frozen.
 */

import { DocMatrixError, ErrorCodes, UnknownFormatError } from "../utils";
import type { TaskIdentity } from "../utils";
import type { Converter } from "../types/converter";

export class ConverterRegistry {
  private converters = new Map<string, Converter>();
  private frozen = false;

  register(name: string, converter: Converter): this {
    if (this.frozen) {
      throw new DocMatrixError(ErrorCodes.CONFIGURATION, `Registry is frozen; cannot register ${name}`);
    }
    if (converter.name !== name) {
      throw new DocMatrixError(
        ErrorCodes.CONFIGURATION,
        `Converter name mismatch: registered as ${name} but reports ${converter.name}`,
      );
    }
    if (this.converters.has(name)) {
      throw new DocMatrixError(ErrorCodes.CONFIGURATION, `Converter already registered: ${name}`);
    }

    this.converters.set(name, converter);
    return this;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  has(name: string): boolean {
    return this.converters.has(name);
  }

  /**
   * Look up a converter. Throws UnknownFormatError for unregistered names.
   */
  resolve(name: string, task?: Omit<TaskIdentity, "format">): Converter {
    const converter = this.converters.get(name);
    if (!converter) {
      throw new UnknownFormatError({ format: name, language: task?.language ?? "", flavor: task?.flavor ?? "" });
    }
    return converter;
  }

  names(): string[] {
    return [...this.converters.keys()];
  }

  list(): Converter[] {
    return [...this.converters.values()];
  }
}
