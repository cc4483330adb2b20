#!/usr/bin/env node

import { createRequire } from "node:module";
import { runCli } from "./cli.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

process.exitCode = await runCli(process.argv, VERSION);
