#!/usr/bin/env tsx
import { main } from './cli';

void main(process.argv).catch(() => {
  process.exitCode = 1;
});
