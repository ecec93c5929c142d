#!/usr/bin/env node

/// # codeprint
///
/// entry point for the `codeprint` binary. everything interesting is in
/// `program.ts`; this file only hands over `process.argv` and the exit code.

import { run } from "./program.js";

process.exitCode = await run(process.argv);
