import { describe, it } from "node:test";
import assert from "node:assert";
import { googleChatConversationId, googleChatToEvent, stripMention } from "./google-chat.js";
import { ValidationError } from "../core/errors.js";

describe("googleChatToEvent", () => {
  it("turns a MESSAGE into an inbound event keyed by space and thread", () => {
    const out = googleChatToEvent({
      type: "MESSAGE",
      eventTime: "2024-01-01T10:00:01.000Z",
      space: { name: "spaces/AAA", type: "ROOM" },
      message: {
        text: "@Helper how do I reset my password?",
        createTime: "2024-01-01T10:00:00.000Z",
        thread: { name: "spaces/AAA/threads/T1" }
      }
    });
    assert.deepStrictEqual(out, {
      kind: "message",
      event: {
        conversationId: "gchat:AAA:T1",
        channel: "google_chat",
        role: "user",
        text: "how do I reset my password?",
        timestamp: "2024-01-01T10:00:00.000Z"
      }
    });
  });

  it("prefers argumentText when Google Chat provides it", () => {
    const out = googleChatToEvent({
      type: "MESSAGE",
      space: { name: "spaces/AAA" },
      message: { text: "@Helper hi", argumentText: " hi ", createTime: "2024-01-01T10:00:00.000Z" }
    });
    assert.strictEqual(out.kind === "message" && out.event.text, "hi");
    assert.strictEqual(out.kind === "message" && out.event.conversationId, "gchat:AAA:main");
  });

  it("turns a card click into a supervisor decision, with edited text from the form", () => {
    const out = googleChatToEvent({
      type: "CARD_CLICKED",
      user: { name: "users/9" },
      action: { actionMethodName: "edit", parameters: [{ key: "caseId", value: "k1" }] },
      common: { formInputs: { text: { stringInputs: { value: ["Please call us."] } } } }
    });
    assert.deepStrictEqual(out, {
      kind: "decision",
      event: { caseId: "k1", decision: "edited", supervisorId: "users/9", text: "Please call us." }
    });
  });

  it("rejects unknown actions and other event types", () => {
    assert.throws(() => googleChatToEvent({
      type: "CARD_CLICKED",
      user: { name: "users/9" },
      action: { actionMethodName: "escalate", parameters: [{ key: "caseId", value: "k1" }] }
    }), ValidationError);
    assert.throws(() => googleChatToEvent({ type: "ADDED_TO_SPACE", space: { name: "spaces/AAA" } }), ValidationError);
  });
});

describe("helpers", () => {
  it("strips a leading bot mention", () => {
    assert.strictEqual(stripMention("@Helper   where is my parcel"), "where is my parcel");
    assert.strictEqual(stripMention("no mention here"), "no mention here");
  });

  it("builds conversation ids from resource names", () => {
    assert.strictEqual(googleChatConversationId("spaces/AAA", "spaces/AAA/threads/T9"), "gchat:AAA:T9");
  });
});
