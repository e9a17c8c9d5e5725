#!/usr/bin/env node
import { handleStdoutError, runCli } from "../cli.js";

process.stdout.on("error", (error) => handleStdoutError(error));

process.exitCode = await runCli(process.argv.slice(2));
