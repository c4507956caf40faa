#!/usr/bin/env node
/**
 * chai - local-first gateway for agents on local model servers.
 */

import { createProgram } from "./cli/commands.js";

await createProgram().parseAsync();
