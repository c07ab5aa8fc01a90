#!/usr/bin/env node

import { runCli } from './commands.js';

runCli(process.argv.slice(2), { cwd: process.cwd(), print: (line) => console.log(line) })
  .then((code) => { process.exit(code); })
  .catch((err) => { console.error(err); process.exit(1); });
