import fs from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { SkipSetting, Suite, TestCase } from './types.js';

const caseRecordSchema = z.object({
  name: z
    .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
    .trim()
    .min(1, 'must not be empty'),
  is_error: z.boolean().optional(),
  // Older descriptors spell the flag this way.
  expect_error: z.boolean().optional(),
  skip: z.union([z.boolean(), z.string()]).nullable().optional(),
  dependencies: z.array(z.string().trim().min(1)).nullable().optional(),
}).strict();

type CaseRecord = z.infer<typeof caseRecordSchema>;

function malformed(message: string, sourcePath?: string): HarnessError {
  const where = sourcePath ? `${sourcePath}: ` : '';
  return new HarnessError(HarnessErrorCode.MALFORMED_SPEC, `${where}${message}`, sourcePath ? { sourcePath } : undefined);
}

function normalizeSkip(skip: CaseRecord['skip']): SkipSetting {
  if (skip === undefined || skip === null) return false;
  if (typeof skip === 'boolean') return skip;
  const reason = skip.trim();
  return reason.length > 0 ? reason : true;
}

function toTestCase(record: CaseRecord): TestCase {
  return Object.freeze({
    name: record.name,
    expectError: record.is_error ?? record.expect_error ?? false,
    skip: normalizeSkip(record.skip),
    dependencies: Object.freeze([...(record.dependencies ?? [])]),
  });
}

function extractRecords(doc: unknown, sourcePath?: string): unknown[] {
  if (Array.isArray(doc)) return doc;
  if (doc !== null && typeof doc === 'object' && 'tests' in doc) {
    const tests: unknown = doc.tests;
    if (Array.isArray(tests)) return tests;
  }
  throw malformed('Suite must be a list of test records or a mapping with a "tests" list', sourcePath);
}

export function parseSuite(text: string, sourcePath?: string): Suite {
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (e) {
    throw malformed(`Invalid suite document: ${(e as Error).message}`, sourcePath);
  }

  const records = extractRecords(doc, sourcePath);
  const cases: TestCase[] = [];
  const seen = new Set<string>();

  records.forEach((raw, index) => {
    const parsed = caseRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      if (issue?.code === 'unrecognized_keys') {
        throw malformed(`Test #${index + 1}: unknown field ${issue.keys.map(k => `"${k}"`).join(', ')}`, sourcePath);
      }
      const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'record';
      throw malformed(`Test #${index + 1}: ${field} ${issue?.message ?? 'is invalid'}`, sourcePath);
    }
    const testCase = toTestCase(parsed.data);
    if (seen.has(testCase.name)) {
      throw malformed(`Test #${index + 1}: duplicate name "${testCase.name}"`, sourcePath);
    }
    seen.add(testCase.name);
    cases.push(testCase);
  });

  return { sourcePath, cases };
}

export async function loadSuite(filePath: string): Promise<Suite> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw malformed(`Cannot read suite descriptor: ${(err as Error).message}`, filePath);
  }
  const suite = parseSuite(text, filePath);
  logger.info({ suite: filePath, cases: suite.cases.length }, 'Suite loaded');
  return suite;
}
