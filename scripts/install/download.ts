import { writeFile } from 'node:fs/promises';

import { DownloadError } from './errors.js';
import { errorMessage } from '../utils.js';

export type DownloadResult = {
  url: string;
  destination: string;
  bytes: number;
};

export type ArchiveDownloader = (url: string, destination: string) => Promise<DownloadResult>;

/**
 * GET `url` (following redirects) and write the whole body to `destination`,
 * replacing any existing file. No retry, no checksum.
 */
export async function downloadArchive(url: string, destination: string): Promise<DownloadResult> {
  let buffer: Buffer;
  try {
    const response = await fetch(url, { redirect: 'follow' });
    if (!response.ok) {
      throw new DownloadError(url, `${response.status} ${response.statusText}`.trim(), {
        statusCode: response.status
      });
    }
    buffer = Buffer.from(await response.arrayBuffer());
  } catch (error) {
    if (error instanceof DownloadError) throw error;
    throw new DownloadError(url, errorMessage(error), { cause: error });
  }

  await writeFile(destination, buffer);
  return { url, destination, bytes: buffer.length };
}
