/**
 * Environment diagnostics script
 *
 * Usage: npm run env:diag
 *
 * Prints how the local tooling resolves its environment without starting anything
 */

import { initEnv, getEnvDiagnostics, PROVIDER_ENV_KEYS } from '@s3object/config';

const { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded } = initEnv();

console.log('🔍 Environment Diagnostics');
console.log(`   Repo root: ${repoRoot}`);
console.log(`   .env file: ${envFilePath}`);
console.log(`   .env exists: ${loaded ? '✅' : '❌'}`);
console.log(`   .env.local file: ${envLocalFilePath}`);
console.log(`   .env.local exists: ${localLoaded ? '✅' : '❌'}`);
console.log(`   Keys loaded from files: ${keysLoaded.length}`);

const diagnostics = getEnvDiagnostics(PROVIDER_ENV_KEYS);

console.log('\n📋 Environment Variables Status:');
for (const key of diagnostics.keys) {
  const status = key.present ? '✅' : '⚪';
  const length = key.length ? ` (length: ${key.length})` : '';
  const masked = key.maskedValue ? ` (${key.maskedValue})` : '';
  const source = key.source ? ` [from ${key.source}]` : '';
  console.log(`   ${status} ${key.key}${length}${masked}${source}`);
}

const structuredOutput = {
  event: 'env.diagnostics',
  envFilePath,
  envFileExists: loaded,
  envLocalFilePath,
  envLocalFileExists: localLoaded,
  keysLoadedCount: keysLoaded.length,
  storageProvider: process.env.STORAGE_PROVIDER || 's3',
  variables: diagnostics.keys.map((k) => ({
    key: k.key,
    present: k.present,
    length: k.length,
    maskedValue: k.maskedValue,
    source: k.source,
  })),
  warnings: diagnostics.warnings,
};

console.log('\n📊 Structured Output (JSON):');
console.log(JSON.stringify(structuredOutput, null, 2));

if (diagnostics.warnings.length > 0) {
  console.log('\n⚠️  Warnings:');
  for (const warning of diagnostics.warnings) {
    console.log(`   - ${warning}`);
  }
}
