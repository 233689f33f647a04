/**
 * Installer download.
 *
 * Writes to a ".part" file and renames it into place, so an interrupted
 * download never looks like a cached installer on the next run.
 */

import fs from "node:fs";
import path from "node:path";

export interface Downloader {
  download(url: string, dest: string): Promise<void>;
}

export function createHttpDownloader(): Downloader {
  async function download(url: string, dest: string): Promise<void> {
    const res = await fetch(url);
    if (!res.ok) {
      throw new Error(`GET ${url} returned ${res.status} ${res.statusText}`);
    }
    const body = Buffer.from(await res.arrayBuffer());
    const partial = `${dest}.part`;
    fs.mkdirSync(path.dirname(dest), { recursive: true });
    try {
      fs.writeFileSync(partial, body);
      fs.renameSync(partial, dest);
    } catch (err) {
      fs.rmSync(partial, { force: true });
      throw err;
    }
  }

  return { download };
}
