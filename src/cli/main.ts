#!/usr/bin/env -S node --import tsx
import { runCli } from "./index";

process.exitCode = await runCli(process.argv.slice(2));
