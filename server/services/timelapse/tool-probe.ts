import fs from "node:fs";
import path from "node:path";

export type ToolProbe = (name: string) => string | null;

const isExecutableFile = (candidate: string): boolean => {
  try {
    if (!fs.statSync(candidate).isFile()) return false;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
};

/** Resolve a tool by name against PATH, like `command -v`. */
export const findExecutable = (name: string, env: NodeJS.ProcessEnv = process.env): string | null => {
  if (name.includes("/")) {
    return isExecutableFile(name) ? path.resolve(name) : null;
  }
  const dirs = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  for (const dir of dirs) {
    const candidate = path.join(dir, name);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
};

export const createToolProbe = (env: NodeJS.ProcessEnv = process.env): ToolProbe => (name) =>
  findExecutable(name, env);
