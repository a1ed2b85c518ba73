import { describe, it, expect } from "vitest";
import pino from "pino";
import type { Logger } from "pino";
import { createTestApp, actorRequest } from "../setup.js";

function capture(): { lines: Record<string, unknown>[]; logger: Logger } {
  const lines: Record<string, unknown>[] = [];
  const logger = pino({ base: null, timestamp: false }, {
    write: (line: string) => {
      lines.push(JSON.parse(line) as Record<string, unknown>);
    },
  });
  return { lines, logger };
}

describe("request logger", () => {
  it("logs a successful request at info", async () => {
    const { lines, logger } = capture();
    const { app } = createTestApp({ requestLogger: logger });

    await app.request(actorRequest("admin", "/api/v1/vaults"));

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      method: "POST",
      path: "/api/v1/vaults",
      status: 201,
      actor: "admin",
      msg: "POST /api/v1/vaults 201",
    });
  });

  it("logs a client error at warn", async () => {
    const { lines, logger } = capture();
    const { app } = createTestApp({ requestLogger: logger });

    await app.request("/api/v1/vaults/vault-404");

    expect(lines[0]).toMatchObject({ level: 40, status: 404 });
  });
});
