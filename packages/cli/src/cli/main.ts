#!/usr/bin/env node
// pattern: Imperative Shell

import { initializeLogger } from "../logger/index.js";

import { getDefaultLogFormat, isNonInteractive, makeRootCommand } from "./index.js";

// Settings errors raised before the preAction hook still get formatted output.
// The hook re-initializes the logger from the command line flags.
initializeLogger(getDefaultLogFormat(), isNonInteractive());

await makeRootCommand().parseAsync(process.argv);
