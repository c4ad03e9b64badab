/**
 * Patient Assessment CLI
 * Reads a patient profile JSON file and prints the clinical summary
 *
 * Usage:
 *   npm run assess -- tools/examples/patient-profile.json [--json]
 *
 * --json prints the full assessment instead of the summary text.
 * Exit codes: 0 assessed, 1 invalid profile, 2 usage or I/O error
 */

import fs from 'node:fs';
import path from 'node:path';

import { createAssessPatientUseCase } from '@kpcdst/application';
import { ValidationError, generateCorrelationId, toSafeErrorResponse } from '@kpcdst/core';

function usage(): never {
  console.error('Usage: assess-patient <profile.json> [--json]');
  process.exit(2);
}

function readProfile(file: string): unknown {
  const fullPath = path.resolve(process.cwd(), file);

  if (!fs.existsSync(fullPath)) {
    console.error(`ERROR: Profile file not found: ${fullPath}`);
    process.exit(2);
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(fullPath, 'utf8'));
    return parsed;
  } catch (error: unknown) {
    const errMessage = error instanceof Error ? error.message : String(error);
    console.error(`ERROR: ${fullPath} is not valid JSON: ${errMessage}`);
    process.exit(2);
  }
}

function main(): void {
  const args = process.argv.slice(2);
  const asJson = args.includes('--json');
  const file = args.find((arg) => !arg.startsWith('--'));

  if (!file) usage();

  const rawProfile = readProfile(file);

  try {
    const assessment = createAssessPatientUseCase().execute(rawProfile, {
      correlationId: generateCorrelationId(),
    });

    if (asJson) {
      console.log(JSON.stringify(assessment, null, 2));
    } else {
      console.log('========================================');
      console.log('  KP-CDST Clinical Summary');
      console.log('========================================\n');
      for (const line of assessment.summary) {
        console.log(line);
      }
    }
  } catch (error: unknown) {
    const safe = toSafeErrorResponse(error);
    console.error(`${safe.code}: ${safe.message}`);
    process.exit(error instanceof ValidationError ? 1 : 2);
  }
}

main();
