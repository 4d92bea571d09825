#!/usr/bin/env node
import "dotenv/config";
import { run } from "./cli.js";
import { loadConfig } from "./config.js";

const cmd = process.argv[2] || "generate";
process.exitCode = run(cmd, loadConfig());
