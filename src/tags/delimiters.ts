import path from 'path';
import { LineTagError } from '../shared/types';

/**
 * Immutable extension → comment-delimiter table.
 * Extension lookup is case-insensitive; keys are stored as ".ext".
 */
export class DelimiterTable {
  private readonly entries: ReadonlyMap<string, string>;

  constructor(delimiters: Record<string, string>) {
    const entries = new Map<string, string>();
    for (const [ext, delimiter] of Object.entries(delimiters)) {
      entries.set(normalizeExtension(ext), delimiter);
    }
    this.entries = entries;
  }

  /** Delimiter for a file path, or undefined when the extension is unknown. */
  lookup(filePath: string): string | undefined {
    const ext = path.extname(filePath);
    if (!ext) return undefined;
    return this.entries.get(ext.toLowerCase());
  }

  supports(filePath: string): boolean {
    return this.lookup(filePath) !== undefined;
  }

  require(filePath: string): string {
    const delimiter = this.lookup(filePath);
    if (delimiter === undefined) {
      throw new LineTagError({
        code: 'E301',
        severity: 'high',
        message: `No comment delimiter registered for ${filePath}`,
        context: { file: filePath },
      });
    }
    return delimiter;
  }

  extensions(): string[] {
    return [...this.entries.keys()].sort();
  }
}

function normalizeExtension(ext: string): string {
  const lower = ext.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}
