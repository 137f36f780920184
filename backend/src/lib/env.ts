import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

type EnvShape = {
  process?: {
    env?: Record<string, string | undefined>;
  };
};

export const readEnv = (key: string): string | undefined => {
  return (globalThis as EnvShape).process?.env?.[key];
};

const unquote = (rawValue: string): string => {
  return (rawValue.startsWith('"') && rawValue.endsWith('"')) ||
    (rawValue.startsWith("'") && rawValue.endsWith("'"))
    ? rawValue.slice(1, -1)
    : rawValue;
};

/** Applies KEY=value lines; variables already set in the environment win. */
export const applyEnvFile = (raw: string, target: Record<string, string | undefined>): void => {
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith("#")) {
      continue;
    }

    const separatorIndex = trimmed.indexOf("=");
    if (separatorIndex <= 0) {
      continue;
    }

    const key = trimmed.slice(0, separatorIndex).trim();
    if (key.length === 0 || target[key] !== undefined) {
      continue;
    }

    target[key] = unquote(trimmed.slice(separatorIndex + 1).trim());
  }
};

let loaded = false;

export const loadProjectEnv = (cwd: string = process.cwd()): void => {
  if (loaded) {
    return;
  }

  loaded = true;

  const envCandidates = [resolve(cwd, ".env"), resolve(cwd, "..", ".env")];
  const envPath = envCandidates.find((path) => existsSync(path));
  if (!envPath) {
    return;
  }

  applyEnvFile(readFileSync(envPath, "utf8"), process.env);
};
