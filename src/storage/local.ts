import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import type { Readable } from "stream";
import { AppError, notFound } from "../errors";
import type { BlobStorage } from "./types";

function hasCode(err: unknown, code: string) {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

export class LocalBlobStorage implements BlobStorage {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async put(key: string, data: Buffer, _contentType: string): Promise<void> {
    const target = this.resolve(key);
    await fsp.mkdir(path.dirname(target), { recursive: true });

    try {
      await fsp.writeFile(target, data, { flag: "wx" });
    } catch (err) {
      if (hasCode(err, "EEXIST")) {
        throw new AppError({ code: "INTERNAL", message: `Blob ${key} already exists`, cause: err });
      }
      throw err;
    }

    console.log(`[STORAGE] wrote ${key} (${data.length} bytes)`);
  }

  async get(key: string): Promise<Buffer> {
    try {
      return await fsp.readFile(this.resolve(key));
    } catch (err) {
      if (hasCode(err, "ENOENT")) {
        throw notFound(`Stored file ${key} is missing`);
      }
      throw err;
    }
  }

  async getStream(key: string): Promise<Readable> {
    const target = this.resolve(key);
    if (!(await this.exists(key))) {
      throw notFound(`Stored file ${key} is missing`);
    }
    return fs.createReadStream(target);
  }

  async exists(key: string): Promise<boolean> {
    try {
      await fsp.access(this.resolve(key));
      return true;
    } catch (err) {
      if (hasCode(err, "ENOENT")) return false;
      throw err;
    }
  }

  async ping(): Promise<void> {
    await fsp.mkdir(this.root, { recursive: true });
    await fsp.access(this.root, fs.constants.W_OK);
  }

  private resolve(key: string) {
    const target = path.resolve(this.root, key);
    if (target !== this.root && !target.startsWith(this.root + path.sep)) {
      throw new AppError({ code: "INTERNAL", message: `Storage key escapes the storage root: ${key}` });
    }
    return target;
  }
}
