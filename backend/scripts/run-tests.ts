import { existsSync, readdirSync } from 'node:fs';
import { join, relative, resolve } from 'node:path';
import { spawnSync } from 'node:child_process';

const projectRoot = process.cwd();

const listTestFiles = (rootDir: string): string[] => {
  const absoluteRoot = resolve(projectRoot, rootDir);
  if (!existsSync(absoluteRoot)) {
    return [];
  }

  const files: string[] = [];
  const stack: string[] = [absoluteRoot];

  for (let currentDir = stack.pop(); currentDir !== undefined; currentDir = stack.pop()) {
    const entries = readdirSync(currentDir, { withFileTypes: true })
      .sort((left, right) => left.name.localeCompare(right.name));
    for (const entry of entries) {
      const fullPath = join(currentDir, entry.name);
      if (entry.isDirectory()) {
        stack.push(fullPath);
        continue;
      }
      if (entry.isFile() && entry.name.endsWith('.test.ts')) {
        files.push(relative(projectRoot, fullPath));
      }
    }
  }

  return files;
};

const testFiles = listTestFiles('src').sort((left, right) => left.localeCompare(right));

if (testFiles.length === 0) {
  console.error('No test files found');
  process.exit(1);
}

const binDirs = [resolve(projectRoot, 'node_modules', '.bin'), resolve(projectRoot, '..', 'node_modules', '.bin')];
const tsxName = process.platform === 'win32' ? 'tsx.cmd' : 'tsx';
const tsxBin = binDirs.map((dir) => join(dir, tsxName)).find((candidate) => existsSync(candidate));

if (!tsxBin) {
  console.error(`Missing tsx binary in ${binDirs.join(' or ')}`);
  process.exit(1);
}

let failedFiles = 0;
for (const file of testFiles) {
  console.log(`\nRUN ${file}`);
  const result = spawnSync(tsxBin, [file], {
    cwd: projectRoot,
    stdio: 'inherit',
  });
  if (result.error) {
    console.error(result.error);
    process.exit(1);
  }
  if (result.status !== 0) {
    failedFiles += 1;
  }
}

console.log(`\nExecuted ${testFiles.length} test files, ${failedFiles} failed.`);
if (failedFiles > 0) {
  process.exit(1);
}
