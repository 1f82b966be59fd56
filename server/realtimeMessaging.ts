import type { IncomingMessage, Server } from "http";
import type { Duplex } from "stream";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { MONITOR_EVENT_TYPES, type MonitorEvent, type MonitorEventType } from "@shared/schema";
import type { MonitorSink } from "./monitor/sinks";
import { log, logDebug, errorMessage } from "./logger";

export const MONITOR_WS_PATH = "/ws/monitor";
const HEARTBEAT_INTERVAL_MS = 30_000;

const EVENT_TYPES: ReadonlySet<string> = new Set(MONITOR_EVENT_TYPES);

const clientMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("subscribe"), events: z.array(z.string()) }),
  z.object({ type: z.literal("ping") }),
]);

interface ClientState {
  clientId: string;
  subscriptions: Set<MonitorEventType>;
  connectedAt: string;
  lastSeen: number;
}

function isMonitorEventType(value: string): value is MonitorEventType {
  return EVENT_TYPES.has(value);
}

/**
 * Keeps the known event types from `requested`. An empty or entirely unknown
 * list subscribes to everything.
 */
export function sanitizeEventTypes(requested: readonly string[] | undefined): Set<MonitorEventType> {
  const sanitized = (requested ?? []).map((value) => value.trim()).filter(isMonitorEventType);
  return new Set(sanitized.length > 0 ? sanitized : MONITOR_EVENT_TYPES);
}

export function parseEventsParam(value: string | null): string[] | undefined {
  if (!value) return undefined;
  return value.split(",").filter((part) => part.length > 0);
}

export interface MonitorStream extends MonitorSink {
  readonly path: string;
  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void;
  close(): void;
}

/**
 * WebSocket sink that broadcasts monitor events to connected dashboards.
 * Clients pick event types with `?events=contest_match,session_state` or a
 * `{ "type": "subscribe", "events": [...] }` message.
 */
export function createMonitorStream(httpServer: Server): MonitorStream {
  const wss = new WebSocketServer({ noServer: true });
  const clients = new Map<WebSocket, ClientState>();

  function send(ws: WebSocket, payload: Record<string, unknown>): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify({ ...payload, timestamp: new Date().toISOString() }));
    }
  }

  function publish(event: MonitorEvent): void {
    const payload = JSON.stringify({ ...event, timestamp: new Date().toISOString() });

    let delivered = 0;

    clients.forEach((state, ws) => {
      if (ws.readyState !== WebSocket.OPEN) return;
      if (!state.subscriptions.has(event.type)) return;

      ws.send(payload);
      delivered += 1;
    });

    if (delivered > 0) {
      logDebug(`Broadcast ${event.type} => ${delivered} clients`, "realtime");
    }
  }

  function handleMessage(ws: WebSocket, state: ClientState, raw: RawData): void {
    state.lastSeen = Date.now();

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.toString());
    } catch (error) {
      log(`Realtime message parse error: ${errorMessage(error)}`, "realtime");
      return;
    }

    const message = clientMessageSchema.safeParse(parsed);
    if (!message.success) {
      send(ws, { type: "error", message: "Unsupported message" });
      return;
    }

    if (message.data.type === "subscribe") {
      state.subscriptions = sanitizeEventTypes(message.data.events);
      send(ws, { type: "subscribed", events: Array.from(state.subscriptions) });
      return;
    }

    send(ws, { type: "pong" });
  }

  function handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const host = request.headers.host || "localhost:5000";
    const url = new URL(request.url || "/", `http://${host}`);

    if (url.pathname !== MONITOR_WS_PATH) {
      socket.write("HTTP/1.1 404 Not Found\r\n\r\n");
      socket.destroy();
      return;
    }

    const subscriptions = sanitizeEventTypes(parseEventsParam(url.searchParams.get("events")));

    wss.handleUpgrade(request, socket, head, (ws) => {
      const state: ClientState = {
        clientId: uuidv4(),
        subscriptions,
        connectedAt: new Date().toISOString(),
        lastSeen: Date.now(),
      };
      clients.set(ws, state);
      log(`Monitor client ${state.clientId} connected (${clients.size} total)`, "realtime");

      send(ws, {
        type: "welcome",
        clientId: state.clientId,
        events: Array.from(state.subscriptions),
      });

      ws.on("message", (raw) => handleMessage(ws, state, raw));

      ws.on("close", () => {
        clients.delete(ws);
      });

      ws.on("error", (error: Error) => {
        log(`Realtime websocket error: ${error.message}`, "realtime");
        clients.delete(ws);
      });
    });
  }

  const heartbeat = setInterval(() => {
    wss.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.ping();
      }
    });
  }, HEARTBEAT_INTERVAL_MS);
  heartbeat.unref();

  function close(): void {
    clearInterval(heartbeat);
    clients.forEach((_state, ws) => ws.close(1001, "server_shutdown"));
    clients.clear();
    wss.close();
  }

  httpServer.on("close", () => clearInterval(heartbeat));

  return {
    name: "websocket",
    path: MONITOR_WS_PATH,
    publish,
    handleUpgrade,
    close,
  };
}
