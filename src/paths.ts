import * as os from "os";
import * as path from "path";

const DATA_DIR_NAME = "tracc";
const STORE_FILE_NAME = "periods.json";

export interface StorePaths {
  folder: string;
  file: string;
}

// Follows the XDG base directory layout: $XDG_DATA_HOME, else ~/.local/share
export function resolveStorePaths(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir()
): StorePaths {
  const dataHome = env.XDG_DATA_HOME
    ? env.XDG_DATA_HOME
    : path.join(homeDir, ".local", "share");
  const folder = path.join(dataHome, DATA_DIR_NAME);
  return { folder, file: path.join(folder, STORE_FILE_NAME) };
}
