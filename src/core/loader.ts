/**
 * Skeletal Template Loaders
 *
 * A loader maps a template name to its raw markup. Loaders are read-only
 * and can be shared between renders.
 */

import { readFileSync } from 'node:fs';
import { MissingTemplateError } from './errors.js';

export interface TemplateLoader {
  /**
   * Return the markup of template `name`.
   * Throws MissingTemplateError when the name cannot be resolved.
   */
  loadMarkup(name: string): string;
}

/**
 * Reads `directory + name` as UTF-8 text.
 */
export class DirectoryLoader implements TemplateLoader {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = directory.length > 0 && !directory.endsWith('/') ? `${directory}/` : directory;
  }

  loadMarkup(name: string): string {
    try {
      return readFileSync(this.directory + name, 'utf8');
    } catch (err) {
      if (isNotFound(err)) {
        throw new MissingTemplateError(name, { cause: err });
      }
      throw err;
    }
  }
}

/**
 * Serves templates from memory, mostly for tests and embedded pages.
 */
export class MemoryLoader implements TemplateLoader {
  private readonly templates: Map<string, string>;

  constructor(templates: Record<string, string> | Map<string, string> = {}) {
    this.templates = templates instanceof Map
      ? new Map(templates)
      : new Map(Object.entries(templates));
  }

  loadMarkup(name: string): string {
    const markup = this.templates.get(name);
    if (markup === undefined) throw new MissingTemplateError(name);
    return markup;
  }
}

function isNotFound(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code: unknown = Reflect.get(err, 'code');
  return code === 'ENOENT' || code === 'ENOTDIR' || code === 'EISDIR';
}
