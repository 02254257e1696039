import dotenv from "dotenv";
import { fileURLToPath } from "node:url";
import path from "node:path";
import { parseLogLevel } from "./logger.js";

dotenv.config();

export const DEFAULT_RULES_FILE = fileURLToPath(new URL("../conf/config.json", import.meta.url));

const timestamp = (d: Date): string => {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}-${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
};

export function defaultOutdir(now: Date = new Date()): string {
  return process.env.PHENOTYPE_OUTDIR ?? path.join("/tmp", "phenotype-import", timestamp(now));
}

export const config = {
  RULES_FILE: process.env.PHENOTYPE_CONFIG_FILE ?? DEFAULT_RULES_FILE,
  LOG_LEVEL: parseLogLevel(process.env.LOG_LEVEL),
  LOG_FILE_NAME: "phenotype-import.log",
} as const;

export type Config = typeof config;
