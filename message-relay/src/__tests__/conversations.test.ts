import { describe, it, expect } from "vitest";
import {
  directConversationId,
  groupConversationId,
  parseConversationId,
} from "../conversations";
import { ValidationError } from "../errors";
import { KeyedSerial } from "../util/keyedSerial";

describe("conversation ids", () => {
  it("gives a direct conversation the same id from either side", () => {
    expect(directConversationId("bob", "alice")).toBe("dm:alice:bob");
    expect(directConversationId("alice", "bob")).toBe("dm:alice:bob");
  });

  it("parses ids back into their variant", () => {
    expect(parseConversationId("dm:alice:bob")).toEqual({
      kind: "direct",
      id: "dm:alice:bob",
      participants: ["alice", "bob"],
    });
    expect(parseConversationId(groupConversationId("standup"))).toEqual({
      kind: "group",
      id: "group:standup",
      groupId: "standup",
    });
  });

  it("rejects malformed ids and participants", () => {
    expect(() => directConversationId("alice", "alice")).toThrow(ValidationError);
    expect(() => directConversationId("a:b", "c")).toThrow("user ids may not contain ':'");
    expect(() => groupConversationId("")).toThrow("groupId is required");
    for (const id of ["dm:bob:alice", "dm:alice", "group:", "chat:1"]) {
      expect(() => parseConversationId(id)).toThrow(`malformed conversation id: ${id}`);
    }
  });
});

describe("KeyedSerial", () => {
  it("runs tasks on one key in order and lets other keys interleave", async () => {
    const serial = new KeyedSerial();
    const log: string[] = [];
    const step = (label: string, ms: number) => () =>
      new Promise<void>((resolve) =>
        setTimeout(() => {
          log.push(label);
          resolve();
        }, ms),
      );

    await Promise.all([
      serial.run("a", step("a1", 20)),
      serial.run("a", step("a2", 0)),
      serial.run("b", step("b1", 5)),
    ]);

    expect(log).toEqual(["b1", "a1", "a2"]);
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(serial.activeKeys).toBe(0);
  });

  it("keeps going after a failed task", async () => {
    const serial = new KeyedSerial();

    const failed = serial.run("a", () => Promise.reject(new Error("boom")));
    const next = serial.run("a", () => Promise.resolve("ok"));

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
