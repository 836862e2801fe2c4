#!/usr/bin/env node

import { createCli } from "./index.js";
import { EXIT_SUCCESS } from "./constants.js";

// Failing commands call process.exit(EXIT_ERROR) themselves
process.exitCode = EXIT_SUCCESS;
await createCli().parseAsync();
