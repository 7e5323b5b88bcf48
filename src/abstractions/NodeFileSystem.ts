import * as fs from "node:fs/promises";
import type { IFileSystem } from "./IFileSystem";

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/** UTF-8 text files on local disk. */
export class NodeFileSystem implements IFileSystem {
  readFile(path: string): Promise<string> {
    return fs.readFile(path, "utf-8");
  }

  writeFile(path: string, content: string): Promise<void> {
    return fs.writeFile(path, content, "utf-8");
  }

  appendFile(path: string, content: string): Promise<void> {
    return fs.appendFile(path, content, "utf-8");
  }

  /** Only a missing path counts as absent; permission errors surface. */
  async exists(path: string): Promise<boolean> {
    try {
      await fs.stat(path);
      return true;
    } catch (err) {
      if (isMissing(err)) {
        return false;
      }
      throw err;
    }
  }

  async mkdir(path: string, options?: { recursive?: boolean }): Promise<void> {
    await fs.mkdir(path, options);
  }

  rename(from: string, to: string): Promise<void> {
    return fs.rename(from, to);
  }
}
