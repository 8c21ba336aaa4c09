import fs from "node:fs";

export interface FileSystem {
  /** Recursive; an existing directory is not an error. */
  ensureDir(dir: string): Promise<void>;
  /** Creates or truncates. */
  writeFile(filePath: string, data: Uint8Array): Promise<void>;
}

export const nodeFileSystem: FileSystem = {
  async ensureDir(dir: string): Promise<void> {
    await fs.promises.mkdir(dir, { recursive: true });
  },
  async writeFile(filePath: string, data: Uint8Array): Promise<void> {
    await fs.promises.writeFile(filePath, data, { flag: "w" });
  },
};
