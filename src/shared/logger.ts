import pino from 'pino';

// stdout carries the PASS/FAIL/SKIP lines, so log records go to stderr.
export const logger = pino(
  {
    name: 'bc-run-harness',
    level: process.env['BC_HARNESS_LOG_LEVEL'] ?? 'info',
  },
  pino.destination({ dest: 2, sync: true })
);
