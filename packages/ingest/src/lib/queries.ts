import { existsSync, readFileSync } from "fs";

export const parseQueryList = (contents: string) =>
  contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"));

export const loadQueries = (filePath: string) => {
  if (!existsSync(filePath)) {
    throw new Error(`Queries file not found: ${filePath}`);
  }
  return parseQueryList(readFileSync(filePath, "utf-8"));
};
