#!/usr/bin/env -S npx tsx
import { run } from './program';

run(process.argv).then((exitCode) => {
  process.exitCode = exitCode;
});
