import { writeFileSync } from 'node:fs';
import { run } from './run.js';

process.exitCode = run(process.argv.slice(2), {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  writeFile: (path, contents) => writeFileSync(path, contents, 'utf-8'),
});
