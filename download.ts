import * as fsp from "node:fs/promises";
import * as path from "node:path";
import { DownloadFailed, getErrorMessage } from "./errors";
import { log } from "./logger";

/** Fetches `url` and writes the body to `destination` */
export type Downloader = (url: string, destination: string) => Promise<void>;

const USER_AGENT = "conda-bootstrap";

export const fetchDownloader: Downloader = async (url, destination) => {
  log.download("GET %s", url);

  let res: Response;
  try {
    res = await fetch(url, { headers: { "User-Agent": USER_AGENT } });
  } catch (err) {
    throw new DownloadFailed(url, getErrorMessage(err), err);
  }
  if (!res.ok) {
    throw new DownloadFailed(url, `HTTP ${res.status}`);
  }

  try {
    const data = Buffer.from(await res.arrayBuffer());
    await fsp.mkdir(path.dirname(destination), { recursive: true });
    await fsp.writeFile(destination, data);
    log.download("Wrote %d bytes to %s", data.length, destination);
  } catch (err) {
    throw new DownloadFailed(url, getErrorMessage(err), err);
  }
};
