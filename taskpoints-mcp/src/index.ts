#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { TaskStore } from "./state/store.js";
import { AuditLog } from "./state/audit.js";
import { ConsoleNotifier } from "./notifier/console.js";
import { WebhookNotifier } from "./notifier/webhook.js";
import { createServer } from "./server.js";

const config = loadConfig();

const store = new TaskStore(config.tasksFile);
const audit = new AuditLog(store.getFilePath());
const notifier = config.webhookUrl
  ? new WebhookNotifier({ url: config.webhookUrl, token: config.webhookToken })
  : new ConsoleNotifier();

const server = createServer({ store, audit, notifier, config });

// --- Start server ---
const transport = new StdioServerTransport();
await server.connect(transport);
console.error(`taskpoints-mcp server started (tasks: ${store.getFilePath()})`);
