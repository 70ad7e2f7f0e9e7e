/**
 * java-frontend/scripts/generate-docs.ts
 *
 * API reference generator.
 *
 *  - Recreates docs/api.
 *  - Converts the public entry point (src/index.ts) with TypeDoc and
 *    renders HTML into docs/api.
 *
 * Usage:
 *   npm run docs
 *
 * Pass `--json` to also write docs/api/project.json.
 */

import { existsSync, mkdirSync, rmSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Application } from 'typedoc';

const here = dirname(fileURLToPath(import.meta.url));
const projectRoot = resolve(here, '..');

type LogLevel = 'info' | 'warn' | 'error';

function log(level: LogLevel, message: string) {
  const prefix =
    level === 'info' ? '[docs] ' : level === 'warn' ? '[docs:warn] ' : '[docs:ERROR] ';
  // eslint-disable-next-line no-console
  console[level === 'error' ? 'error' : 'log'](prefix + message);
}

function resetDir(dir: string) {
  if (existsSync(dir)) {
    log('info', `Cleaning existing docs output: ${dir}`);
    rmSync(dir, { recursive: true, force: true });
  }
  mkdirSync(dir, { recursive: true });
}

async function main() {
  const outDir = resolve(projectRoot, 'docs/api');
  const writeJson = process.argv.includes('--json');

  log('info', 'Generating java-frontend API docs');
  log('info', `Project root: ${projectRoot}`);
  log('info', `API output:   ${outDir}`);

  resetDir(outDir);

  const app = await Application.bootstrapWithPlugins({
    entryPoints: [resolve(projectRoot, 'src/index.ts')],
    tsconfig: resolve(projectRoot, 'tsconfig.json'),
    excludeExternals: true,
    excludePrivate: true,
    excludeProtected: true,
    hideGenerator: true,
    includeVersion: true,
    readme: 'none',
  });

  const project = await app.convert();
  if (!project) {
    log('error', 'TypeDoc could not convert the project; see the messages above.');
    process.exitCode = 1;
    return;
  }

  app.validate(project);
  if (app.logger.hasErrors()) {
    log('error', 'Validation failed.');
    process.exitCode = 1;
    return;
  }

  await app.generateDocs(project, outDir);
  if (writeJson) {
    await app.generateJson(project, resolve(outDir, 'project.json'));
  }

  if (app.logger.hasWarnings()) {
    log('warn', 'Docs generated with warnings.');
  } else {
    log('info', 'Docs generated.');
  }
}

main().catch((err: unknown) => {
  log('error', 'Unexpected error while generating docs.');
  log('error', err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
});
