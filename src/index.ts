#!/usr/bin/env node
// ATC Phrase Relay - Entry point

import "dotenv/config";
import { runCli } from "./app.js";

runCli(process.argv.slice(2), process.env).then((code) => process.exit(code));
