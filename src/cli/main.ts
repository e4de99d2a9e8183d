#!/usr/bin/env node
import process from "node:process";

import { runCli } from "./runCli.js";

process.exitCode = await runCli(process.argv);
