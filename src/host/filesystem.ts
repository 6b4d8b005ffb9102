import fs from "fs";

export interface FileStat {
  mode: number;
  uid: number;
  size: number;
}

/** The slice of the host filesystem the provisioner inspects. */
export interface HostFilesystem {
  readFile(path: string): Promise<string | null>;
  stat(path: string): Promise<FileStat | null>;
}

export class LocalFilesystem implements HostFilesystem {
  async readFile(path: string): Promise<string | null> {
    try {
      return await fs.promises.readFile(path, "utf8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async stat(path: string): Promise<FileStat | null> {
    try {
      const stats = await fs.promises.stat(path);
      return { mode: stats.mode & 0o777, uid: stats.uid, size: stats.size };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
