#!/usr/bin/env node
// Lv.4 TUI Client: Terminal chat via WebSocket

import * as readline from "node:readline";
import { WebSocket } from "ws";
import type { WsClientInput } from "./protocol.js";
import type { WsServerMessage } from "./types.js";
import { HELP_TEXT, TranscriptRenderer, nextSession, parseInputLine } from "./tui-format.js";

const args = process.argv.slice(2);
const port = getArg("--port", process.env.WEBCHAT_PORT ?? "19999");
const host = getArg("--host", "127.0.0.1");
const token = getArg("--token", process.env.WEBCHAT_AUTH_TOKEN ?? "");
let currentSession: string | null = getArg("--session", "") || null;

function getArg(name: string, fallback: string): string {
  const idx = args.indexOf(name);
  if (idx === -1 || idx + 1 >= args.length) return fallback;
  return args[idx + 1];
}

const wsUrl = `ws://${host}:${port}/ws`;
const renderer = new TranscriptRenderer(process.stdout.isTTY);

let ws: WebSocket;

const rl = readline.createInterface({
  input: process.stdin,
  output: process.stdout,
  prompt: "\x1b[36myou>\x1b[0m ",
});

function send(message: WsClientInput): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  } else {
    console.log("\x1b[31mNot connected\x1b[0m");
  }
}

function connect(): void {
  console.log(`\x1b[90mConnecting to ${wsUrl}...\x1b[0m`);

  const headers: Record<string, string> = {};
  if (token) headers["Authorization"] = `Bearer ${token}`;

  ws = new WebSocket(wsUrl, { headers });

  ws.on("open", () => {
    send(currentSession ? { type: "load_chat", sessionId: currentSession } : { type: "list_chats" });
    rl.prompt();
  });

  ws.on("message", (raw) => {
    let msg: WsServerMessage;
    try {
      msg = JSON.parse(raw.toString()) as WsServerMessage;
    } catch {
      return;
    }
    currentSession = nextSession(currentSession, msg);
    const out = renderer.render(msg);
    if (out) process.stdout.write(out);
    if (msg.type !== "delta") rl.prompt(true);
  });

  ws.on("close", () => {
    console.log("\n\x1b[31m● Disconnected\x1b[0m");
    setTimeout(connect, 2000);
  });

  ws.on("error", (err) => {
    console.error(`\x1b[31mWS error: ${err.message}\x1b[0m`);
  });
}

rl.on("line", (line) => {
  const command = parseInputLine(line, currentSession);
  if (!command) {
    rl.prompt();
    return;
  }
  switch (command.kind) {
    case "quit":
      console.log("Bye!");
      process.exit(0);
      break;
    case "help":
      console.log(HELP_TEXT);
      break;
    case "error":
      console.log(`\x1b[31m${command.message}\x1b[0m`);
      break;
    case "send":
      send(command.message);
      break;
  }
  rl.prompt();
});

rl.on("close", () => {
  process.exit(0);
});

connect();
