#!/usr/bin/env node
import { loadConfig } from "taskpoints-mcp";
import { run } from "./cli.js";

const { tasksFile } = loadConfig();

const output = await run(process.argv.slice(2), tasksFile);
console.log(output);
