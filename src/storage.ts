import { promises as fs } from "fs";
import * as path from "path";
import type { StoreFile, WorkPeriod } from "./types";
import type { StorePaths } from "./paths";
import { TraccError, describeCause } from "./errors";
import { checkPeriods } from "./periodUtils";

const STORE_VERSION = 1;

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

export class StorageService {
  private readonly paths: StorePaths;

  constructor(paths: StorePaths) {
    this.paths = paths;
  }

  get file(): string {
    return this.paths.file;
  }

  // The file is re-read on every call; other invocations may have written it
  async loadPeriods(): Promise<WorkPeriod[]> {
    return this.readStoreFile();
  }

  async savePeriods(periods: readonly WorkPeriod[]): Promise<void> {
    const serializable = {
      version: STORE_VERSION,
      periods: periods.map((period) => ({
        start: period.start,
        end: period.end,
      })),
    } satisfies StoreFile;
    const text = `${JSON.stringify(serializable, null, 2)}\n`;

    await this.ensureFolder(this.paths.folder);
    await this.atomicWrite(this.paths.file, text);
  }

  // #region Helpers

  private async readStoreFile(): Promise<WorkPeriod[]> {
    const file = this.paths.file;
    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        return [];
      }
      throw new TraccError(
        "IO_FAILURE",
        `Could not read ${file}: ${describeCause(err)}`,
        { cause: err }
      );
    }

    if (!text.trim()) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw this.unreadable(describeCause(err), err);
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw this.unreadable("expected a JSON object");
    }
    const version = "version" in parsed ? parsed.version : STORE_VERSION;
    if (version !== STORE_VERSION) {
      throw this.unreadable(`unsupported version ${String(version)}`);
    }
    const checked = checkPeriods(
      "periods" in parsed ? parsed.periods : undefined
    );
    if (!checked.ok) {
      throw this.unreadable(checked.reason);
    }
    return checked.periods;
  }

  private unreadable(reason: string, cause?: unknown): TraccError {
    return new TraccError(
      "STORE_UNREADABLE",
      `Could not read store file ${this.paths.file}: ${reason}`,
      cause === undefined ? undefined : { cause }
    );
  }

  private async ensureFolder(folder: string): Promise<void> {
    try {
      await fs.mkdir(folder, { recursive: true });
    } catch (err) {
      throw new TraccError(
        "IO_FAILURE",
        `Could not create data directory ${folder}: ${describeCause(err)}`,
        { cause: err }
      );
    }
  }

  private async atomicWrite(file: string, text: string): Promise<void> {
    const tempFile = `${file}.tmp`;
    const backupFile = `${file}.bak`;
    try {
      await fs.writeFile(tempFile, text, "utf8");
      try {
        await fs.copyFile(file, backupFile);
      } catch (err) {
        if (!isMissingFile(err)) {
          throw err;
        }
      }
      await fs.rename(tempFile, file);
    } catch (err) {
      await this.removeTempFile(tempFile);
      throw new TraccError(
        "IO_FAILURE",
        `Could not write ${file}: ${describeCause(err)}`,
        { cause: err }
      );
    }
  }

  private async removeTempFile(tempFile: string): Promise<void> {
    try {
      await fs.rm(tempFile, { force: true });
    } catch (err) {
      console.error(
        `tracc: failed to remove temporary file ${path.basename(tempFile)}`,
        err
      );
    }
  }

  // #endregion
}
