#!/usr/bin/env node
import { run } from "./cli.js";

// parse argv and run
process.exitCode = run(process.argv.slice(2));
