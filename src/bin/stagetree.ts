#!/usr/bin/env node
import { execute } from '../cli';

execute(process.argv).catch(err => {
  console.error(err);
  process.exitCode = 1;
});
