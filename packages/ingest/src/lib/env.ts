import { existsSync } from "fs";
import { dirname, resolve } from "path";
import dotenv from "dotenv";

const MAX_PARENT_DEPTH = 5;

export const findEnvFile = (startDir = process.cwd()) => {
  let currentDir = startDir;
  for (let i = 0; i <= MAX_PARENT_DEPTH; i += 1) {
    const envPath = resolve(currentDir, ".env");
    if (existsSync(envPath)) {
      return envPath;
    }
    const parent = dirname(currentDir);
    if (parent === currentDir) {
      break;
    }
    currentDir = parent;
  }
  return null;
};

/** Loads the nearest .env; variables already set in the environment win. */
export const loadDotEnv = () => {
  const envPath = findEnvFile();
  if (envPath) {
    dotenv.config({ path: envPath });
  }
  return envPath;
};
