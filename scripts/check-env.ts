#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for the scene validator.
 * Checks the validation settings, the advisor credential and the Supabase
 * `validations` table.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { createClient } from '@supabase/supabase-js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const skip = (label: string, reason: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  (${reason})`);

let anyRequiredFailed = false;

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Scene Validator — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Configuration${RESET}`);

// The config module parses (and rejects) the environment as it loads.
const loaded = await import('../src/config.js').then(
  (mod) => {
    pass('Environment variables parse');
    return mod;
  },
  (err: unknown) => {
    fail('Environment variables parse', err instanceof Error ? err.message : String(err));
    anyRequiredFailed = true;
    return null;
  },
);

if (loaded) {
  const parsed = loaded.env;
  const config = loaded.buildValidatorConfig(parsed, process.env);
  pass('Default validation level', config.defaultLevel);
  pass('Max scenes per batch',     String(config.maxScenesPerBatch));
  pass('Advisor timeout',          `${config.advisor.timeoutMs}ms`);
  pass('Scenes without scene_id',  config.unkeyedScenes);

  // ── Section: Advisor ────────────────────────────────────────────────────────

  console.log(`\n${BOLD}[ 2 ] Continuity advisor${RESET}`);

  const keyVar = parsed.ADVISOR_API_KEY_ENV;
  if (config.advisor.apiKey) {
    const key = config.advisor.apiKey;
    pass(keyVar, key.length > 10 ? `${key.slice(0, 6)}…` : '(set)');
    pass('Advisor model', config.advisor.model);
  } else {
    skip(keyVar, 'not set — thorough validations run without advisory review');
  }

  // ── Section: Supabase ───────────────────────────────────────────────────────

  console.log(`\n${BOLD}[ 3 ] Supabase${RESET}`);

  const { SUPABASE_URL: url, SUPABASE_SERVICE_KEY: serviceKey } = parsed;
  if (url && serviceKey) {
    process.stdout.write('  Testing validations table… ');
    try {
      const sb = createClient(url, serviceKey);
      const { error } = await sb.from('validations').select('validation_id').limit(1);
      if (error) throw new Error(error.message);
      console.log(`${GREEN}✓${RESET}  reachable`);
    } catch (err) {
      console.log(`${RED}✗${RESET}`);
      fail('Supabase check failed', err instanceof Error ? err.message : String(err));
      console.error(`    ${YELLOW}hint: apply migrations/001_validations.sql in the Supabase SQL editor${RESET}`);
      anyRequiredFailed = true;
    }
    pass('Results bucket', parsed.SUPABASE_BUCKET);
    pass('Local fallback queue', parsed.LOCAL_FALLBACK_DB);
  } else {
    skip('Supabase', 'SUPABASE_URL / SUPABASE_SERVICE_KEY not set — results kept in memory only');
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm start${RESET}\n`);
}
