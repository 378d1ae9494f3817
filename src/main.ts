#!/usr/bin/env node
import { runCLI } from "./io/cli.js";

process.exitCode = await runCLI(process.argv.slice(2));
