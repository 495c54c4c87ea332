import path from "node:path";

export const CONFIG_FILE_NAME = ".trackline.yml";

export function userConfigPath(homeDir: string): string {
  return path.join(homeDir, CONFIG_FILE_NAME);
}

export function localConfigPath(cwd: string): string {
  return path.join(cwd, CONFIG_FILE_NAME);
}

// Shown in messages; keeps the home directory out of error text.
export function displayConfigPath(filePath: string, homeDir: string): string {
  const relative = path.relative(homeDir, filePath);
  if (relative.length > 0 && !relative.startsWith("..") && !path.isAbsolute(relative)) {
    return path.posix.join("~", ...relative.split(path.sep));
  }
  return filePath;
}
