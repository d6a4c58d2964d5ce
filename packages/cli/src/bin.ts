#!/usr/bin/env node

import { run } from "./cli.js";

void run().catch(() => {
  process.exitCode = 1;
});
