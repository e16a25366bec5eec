import fs from 'node:fs/promises';
import { BackendError, NotFoundError } from '@semantix/shared';

/** Reads a local path or an http(s) URL as UTF-8 text. */
export class FileReader {
  async read(source: string): Promise<string> {
    if (/^https?:\/\//i.test(source)) {
      return this.fetchText(source);
    }
    try {
      return await fs.readFile(source, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        throw new NotFoundError('File', source);
      }
      throw err;
    }
  }

  private async fetchText(url: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url);
    } catch (err) {
      throw new BackendError('http', `request to ${url} failed`, err);
    }
    if (response.status === 404) throw new NotFoundError('URL', url);
    if (!response.ok) {
      throw new BackendError('http', `${url} returned ${response.status}`);
    }
    return response.text();
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
