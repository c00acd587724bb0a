import { config as loadEnv } from 'dotenv';

loadEnv();

function numberFromEnv(name: string, fallback: number) {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export interface IntakeConfig {
  sampleLines: number;
  outputDir: string;
  rulesPath: string;
  fuzzyCutoff: number;
}

export const DEFAULT_SAMPLE_LINES = 1000;

export const intakeConfig: IntakeConfig = {
  sampleLines: Math.max(1, Math.floor(numberFromEnv('INTAKE_SAMPLE_LINES', DEFAULT_SAMPLE_LINES))),
  outputDir: process.env.INTAKE_OUTPUT_DIR || 'workingdir/downloads',
  rulesPath: process.env.INTAKE_RULES_PATH || 'workingdir/RuleTables.xlsx',
  fuzzyCutoff: numberFromEnv('INTAKE_FUZZY_CUTOFF', 0),
};
