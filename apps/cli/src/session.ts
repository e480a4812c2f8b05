import { promises as fs } from 'node:fs';
import path from 'node:path';

const SESSION_FILE_MODE = 0o600;

const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === 'ENOENT';

/** The server session token, kept between invocations. */
export class SessionFile {
  constructor(private readonly filePath: string) {}

  async read(): Promise<string | null> {
    try {
      const contents = await fs.readFile(this.filePath, 'utf8');
      const token = contents.trim();
      return token.length > 0 ? token : null;
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  async write(token: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${token}\n`, {
      encoding: 'utf8',
      mode: SESSION_FILE_MODE,
    });
  }

  /** Resolves false when there was no session to remove. */
  async clear(): Promise<boolean> {
    try {
      await fs.unlink(this.filePath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }
}
