#!/usr/bin/env tsx
/**
 * Golden Parcel Test Runner
 *
 * Validates that parcel layer normalization produces stable outputs
 * from recorded-shape query responses.
 * Run with: npm run parcel:golden
 */

import type { ParcelCandidate } from "../lib/parcels/types";
import {
  arcgisQueryResponseSchema,
  normalizeArcgisParcelFeatures,
  type ParcelFieldMap,
} from "../lib/parcels/sources/arcgis/normalize";
import { SAN_DIEGO_PARCEL_FIELDS } from "../lib/parcels/sources/san-diego-parcels/constants";
import {
  loadGoldenFixture,
  sanDiegoParcelGoldenCases,
  validateGoldenCase,
  type GoldenParcelCase,
} from "../lib/parcels/sources/san-diego-parcels/golden/cases";

// Colors for terminal output
const colors = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  dim: "\x1b[2m",
};

interface TestSuite {
  name: string;
  source: string;
  cases: GoldenParcelCase[];
  fieldMap: ParcelFieldMap;
}

const testSuites: TestSuite[] = [
  {
    name: "San Diego County Parcels",
    source: "ca-san-diego-parcels",
    cases: sanDiegoParcelGoldenCases,
    fieldMap: SAN_DIEGO_PARCEL_FIELDS,
  },
];

function normalizeFixture(testCase: GoldenParcelCase, fieldMap: ParcelFieldMap): ParcelCandidate[] {
  const payload = arcgisQueryResponseSchema.parse(loadGoldenFixture(testCase));
  return normalizeArcgisParcelFeatures(payload, fieldMap);
}

function runGoldenTests(): void {
  console.log(`\n${colors.blue}=== Parcel Normalization Golden Tests ===${colors.reset}\n`);

  let totalPassed = 0;
  let totalFailed = 0;
  const allFailures: Array<{ suite: string; case: GoldenParcelCase; errors: string[] }> = [];

  for (const suite of testSuites) {
    console.log(`\n${colors.blue}--- ${suite.name} (${suite.source}) ---${colors.reset}\n`);

    let passed = 0;
    let failed = 0;

    for (const testCase of suite.cases) {
      console.log(`${colors.dim}Testing: ${testCase.name} (${testCase.id})${colors.reset}`);

      try {
        const result = validateGoldenCase(normalizeFixture(testCase, suite.fieldMap), testCase.expect);

        if (result.passed) {
          console.log(`  ${colors.green}✓ PASSED${colors.reset}`);
          passed++;
        } else {
          console.log(`  ${colors.red}✗ FAILED${colors.reset}`);
          result.failures.forEach((f) => {
            console.log(`    ${colors.red}- ${f}${colors.reset}`);
          });
          failed++;
          allFailures.push({ suite: suite.name, case: testCase, errors: result.failures });
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.log(`  ${colors.red}✗ ERROR: ${message}${colors.reset}`);
        failed++;
        allFailures.push({ suite: suite.name, case: testCase, errors: [message] });
      }
    }

    console.log(`\n  ${suite.name} Summary: ${colors.green}${passed} passed${colors.reset}, ${colors.red}${failed} failed${colors.reset}`);
    totalPassed += passed;
    totalFailed += failed;
  }

  console.log(`\n${colors.blue}=== Overall Summary ===${colors.reset}`);
  console.log(`  Total: ${totalPassed + totalFailed}`);
  console.log(`  ${colors.green}Passed: ${totalPassed}${colors.reset}`);
  console.log(`  ${colors.red}Failed: ${totalFailed}${colors.reset}`);

  if (allFailures.length > 0) {
    console.log(`\n${colors.yellow}=== Failure Details ===${colors.reset}`);
    for (const failure of allFailures) {
      console.log(`\n  [${failure.suite}] ${failure.case.name} (${failure.case.id}):`);
      failure.errors.forEach((e) => {
        console.log(`    - ${e}`);
      });
    }
    process.exit(1);
  }

  console.log(`\n${colors.green}All golden tests passed!${colors.reset}\n`);
}

runGoldenTests();
