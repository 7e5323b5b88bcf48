import type { IFileSystem } from "./IFileSystem";

function parentOf(path: string): string {
  return path.substring(0, path.lastIndexOf("/")) || "/";
}

/** Posix-path file system held in memory, for tests. */
export class InMemoryFileSystem implements IFileSystem {
  private files = new Map<string, string>();
  private dirs = new Set<string>(["/"]);

  async readFile(path: string): Promise<string> {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file '${path}'`);
    }
    return content;
  }

  async writeFile(path: string, content: string): Promise<void> {
    this.files.set(path, content);
  }

  async appendFile(path: string, content: string): Promise<void> {
    this.files.set(path, (this.files.get(path) ?? "") + content);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(path) || this.dirs.has(path);
  }

  async mkdir(path: string, options?: { recursive?: boolean }): Promise<void> {
    if (options?.recursive) {
      let current = "";
      for (const part of path.split("/").filter(Boolean)) {
        current += "/" + part;
        this.dirs.add(current);
      }
      return;
    }
    const parent = parentOf(path);
    if (!this.dirs.has(parent)) {
      throw new Error(`ENOENT: no such directory '${parent}'`);
    }
    this.dirs.add(path);
  }

  async rename(from: string, to: string): Promise<void> {
    const content = this.files.get(from);
    if (content === undefined) {
      throw new Error(`ENOENT: no such file '${from}'`);
    }
    this.files.delete(from);
    this.files.set(to, content);
  }
}
