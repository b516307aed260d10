import { promises as fsp } from 'fs';
import * as path from 'path';
import type { SourceDocument } from './types.js';
import { ProcessingError, ValidationError, Validators, type Logger } from './utils.js';

export const DOCUMENT_EXTENSION = '.xml';

/**
 * Event documents of one directory, always in ascending file name order.
 * Later reports only beat earlier ones on timestamp, so this order decides
 * which of two equally timed reports is kept.
 */
export class DocumentStore {
  constructor(private directory: string, private logger: Logger) {}

  async list(): Promise<string[]> {
    if (!Validators.isValidDirectory(this.directory)) {
      throw new ValidationError('Data directory does not exist', { directory: this.directory });
    }

    const entries = await fsp.readdir(this.directory, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && entry.name.endsWith(DOCUMENT_EXTENSION))
      .map(entry => entry.name)
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  async *documents(): AsyncGenerator<SourceDocument> {
    const names = await this.list();
    this.logger.info(`Reading from folder '${this.directory}' ...`);

    for (const [index, name] of names.entries()) {
      const filePath = path.join(this.directory, name);
      this.logger.info(`(${String(index + 1).padStart(2)} of ${names.length}) reading '${filePath}' ...`);
      let content: string;
      try {
        content = await fsp.readFile(filePath, 'utf-8');
      } catch (error: unknown) {
        throw new ProcessingError('Failed to read document', { originalError: error, path: filePath });
      }
      yield { name, path: filePath, content };
    }
  }
}
