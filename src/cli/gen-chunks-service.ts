#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';
import { genChunksService } from '../services';
import { runServiceCli } from '.';

runServiceCli(genChunksService, hideBin(process.argv)).then((code) => {
  process.exitCode = code;
}, (error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
