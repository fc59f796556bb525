/**
 * Archive integrity check: the whole gzip stream must decompress cleanly
 */

import { createReadStream } from "node:fs";
import { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGunzip } from "node:zlib";
import type { IntegrityChecker } from "../../types";
import { logger } from "../../utils/logger";
import { getErrorMessage } from "../errors";

function discard(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
}

export class GzipIntegrityChecker implements IntegrityChecker {
  async verify(archivePath: string): Promise<boolean> {
    try {
      await pipeline(createReadStream(archivePath), createGunzip(), discard());
      return true;
    } catch (error) {
      logger.debug(`gzip check failed for ${archivePath}: ${getErrorMessage(error)}`);
      return false;
    }
  }
}
