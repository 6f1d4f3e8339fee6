import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { createAssistant } from "./assistant.js";
import type { CalendarGateway } from "./calendar.js";
import type { AssistantConfig } from "./config.js";
import { createSession, type ChatSession, type QueryOrchestrator } from "./orchestrator.js";
import { OwnerQueue } from "./owner-queue.js";
import { formatMemoriesForContext } from "./store.js";
import { logErr } from "./util.js";

export type ServerOptions = {
  orchestrator: QueryOrchestrator;
  calendar?: CalendarGateway;
  calendarAuthUrl?: string;
  /** Live conversations by owner. An owner's entry is removed by `memory-clear`. */
  sessions?: Map<string, ChatSession>;
  queue?: OwnerQueue;
};

const ownerField = z.string().trim().min(1).max(200).describe("Opaque id of the student whose memories, history and calendar are used.");

const chatInput = {
  owner: ownerField,
  message: z.string().min(1).max(4000).describe("The student's message, verbatim."),
};

const ownerInput = { owner: ownerField };

function textResult(text: string, isError = false): CallToolResult {
  return { content: [{ type: "text", text }], ...(isError ? { isError } : {}) };
}

export function createAssistantMcpServer({
  orchestrator,
  calendar,
  calendarAuthUrl,
  sessions = new Map(),
  queue = new OwnerQueue(),
}: ServerOptions) {
  const sessionFor = (owner: string) => {
    let session = sessions.get(owner);
    if (!session) {
      session = createSession(owner);
      sessions.set(owner, session);
    }
    return session;
  };

  const serialize = <T>(owner: string, task: () => Promise<T>) => queue.run(owner, task);

  const server = new McpServer({ name: "student-assistant", version: "0.1.0" });

  server.registerTool(
    "assistant-chat",
    {
      description:
        "Send a student's message to the assistant. Statements like \"remember that I prefer morning study sessions\" are saved as memories; " +
        "questions about meetings, today, tomorrow or this week read the connected calendar. Returns the assistant's reply.",
      inputSchema: chatInput,
    },
    async ({ owner, message }) => {
      const outcome = await serialize(owner, () => orchestrator.handle(sessionFor(owner), message));
      return textResult(outcome.reply);
    }
  );

  server.registerTool(
    "memory-list",
    {
      description: "List everything remembered about a student, oldest first.",
      inputSchema: ownerInput,
    },
    async ({ owner }) => {
      const records = await serialize(owner, () =>
        orchestrator.getAllMemories(sessions.get(owner) ?? createSession(owner))
      );
      return textResult(formatMemoriesForContext(records));
    }
  );

  server.registerTool(
    "memory-clear",
    {
      description: "Permanently delete every memory stored for a student and clear the conversation. Safe to repeat.",
      inputSchema: ownerInput,
    },
    async ({ owner }) => {
      const res = await serialize(owner, async () => {
        const session = sessions.get(owner);
        if (!session) return orchestrator.resetAll(createSession(owner));
        const reset = await orchestrator.resetAll(session);
        if (reset.ok) sessions.delete(owner);
        return reset;
      });
      if (!res.ok) {
        logErr("warn: clearing memories failed for", owner, "-", res.error.message);
        return textResult("Could not clear memories, please try again.", true);
      }
      return textResult("All memories cleared.");
    }
  );

  server.registerTool(
    "history-clear",
    {
      description: "Forget the current conversation for a student. Stored memories are kept. Safe to repeat.",
      inputSchema: ownerInput,
    },
    async ({ owner }) => {
      await serialize(owner, async () => {
        sessions.delete(owner);
      });
      return textResult("Conversation history cleared.");
    }
  );

  server.registerTool(
    "calendar-connect",
    {
      description: "Check the calendar connection. Returns a consent URL when no stored Google token is available.",
      inputSchema: {},
    },
    async () => {
      if (!calendar) return textResult("No calendar is configured. Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET.", true);
      if (await calendar.authenticate()) return textResult("Calendar connected.");
      const hint = calendarAuthUrl ? ` Authorize access at ${calendarAuthUrl} and save the token file.` : "";
      return textResult(`Calendar is not authenticated.${hint}`, true);
    }
  );

  return server;
}

export async function runStdioServer(config: AssistantConfig) {
  const assistant = createAssistant(config);
  const server = createAssistantMcpServer(assistant);
  const shutdown = () => {
    assistant.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logErr("warn: closing stores failed:", String(err));
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  await server.connect(new StdioServerTransport());
  logErr("info: student-assistant ready,", `memory backend ${assistant.memory.kind},`, `${assistant.replies} replies`);
}
