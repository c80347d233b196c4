import { describe, it, expect, afterEach, vi } from "vitest";
import { ProxyAgent } from "undici";
import { z } from "zod";
import { ChatApiError } from "../errors";
import {
  createTelegramChannel,
  createTelegramClient,
  toInlineKeyboard,
} from "./telegram";

function jsonResponse(status: number, body: unknown) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: vi.fn().mockResolvedValue(body),
  };
}

const client = () =>
  createTelegramClient({
    token: "test-token",
    apiBaseUrl: "https://telegram.test/",
    requestTimeoutMs: 1000,
  });

describe("createTelegramClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should POST JSON params to the bot method url and return the result", async () => {
    const mockFetch = vi
      .fn()
      .mockResolvedValue(jsonResponse(200, { ok: true, result: { message_id: 5 } }));
    vi.stubGlobal("fetch", mockFetch);

    const result = await client()(
      "sendMessage",
      { chat_id: "-100", text: "hi" },
      z.object({ message_id: z.number() }),
    );

    expect(result).toEqual({ message_id: 5 });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe("https://telegram.test/bottest-token/sendMessage");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({ "content-type": "application/json" });
    expect(JSON.parse(init.body)).toEqual({ chat_id: "-100", text: "hi" });
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("should send requests through a proxy agent when a proxy url is set", async () => {
    const mockFetch = vi.fn().mockResolvedValue(jsonResponse(200, { ok: true, result: true }));
    vi.stubGlobal("fetch", mockFetch);

    const call = createTelegramClient({
      token: "test-token",
      apiBaseUrl: "https://telegram.test",
      requestTimeoutMs: 1000,
      proxyUrl: "http://proxy.test:3128",
    });
    await call("getMe", {}, z.unknown());
    await call("getMe", {}, z.unknown());

    const [, first] = mockFetch.mock.calls[0] ?? [];
    const [, second] = mockFetch.mock.calls[1] ?? [];
    expect(first.dispatcher).toBeInstanceOf(ProxyAgent);
    expect(second.dispatcher).toBe(first.dispatcher);
  });

  it("should use the default dispatcher without a proxy url", async () => {
    const mockFetch = vi.fn().mockResolvedValue(jsonResponse(200, { ok: true, result: true }));
    vi.stubGlobal("fetch", mockFetch);

    await client()("getMe", {}, z.unknown());

    const [, init] = mockFetch.mock.calls[0] ?? [];
    expect(init).not.toHaveProperty("dispatcher");
  });

  it("should throw ChatApiError with the API description when ok is false", async () => {
    vi.stubGlobal(
      "fetch",
      vi
        .fn()
        .mockResolvedValue(
          jsonResponse(400, { ok: false, description: "Bad Request: chat not found" }),
        ),
    );

    await expect(client()("sendMessage", {}, z.unknown())).rejects.toThrow(
      "telegram sendMessage failed: Bad Request: chat not found",
    );
  });

  it("should fall back to the HTTP status when no description is given", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse(502, { ok: false })));

    await expect(client()("getUpdates", {}, z.unknown())).rejects.toThrow(
      "telegram getUpdates failed: HTTP 502",
    );
  });

  it("should wrap network failures in ChatApiError", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("ECONNRESET")));

    const call = client()("sendMessage", {}, z.unknown());
    await expect(call).rejects.toBeInstanceOf(ChatApiError);
    await expect(call).rejects.toThrow("telegram sendMessage failed: ECONNRESET");
  });

  it("should reject a result that does not match the schema", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(jsonResponse(200, { ok: true, result: { id: "x" } })),
    );

    await expect(
      client()("sendMessage", {}, z.object({ message_id: z.number() })),
    ).rejects.toThrow("telegram sendMessage failed: unexpected result shape");
  });
});

describe("toInlineKeyboard", () => {
  it("should map link and callback buttons to inline keyboard buttons", () => {
    expect(
      toInlineKeyboard([
        [{ kind: "link", label: "Open", url: "https://example.com/a" }],
        [{ kind: "callback", label: "👍 0", data: "like" }],
      ]),
    ).toEqual({
      inline_keyboard: [
        [{ text: "Open", url: "https://example.com/a" }],
        [{ text: "👍 0", callback_data: "like" }],
      ],
    });
  });
});

describe("createTelegramChannel", () => {
  it("should send HTML messages with the keyboard and return the message id as a string", async () => {
    const call = vi.fn().mockResolvedValue({ message_id: 77 });
    const channel = createTelegramChannel(call, "-100123");

    const messageId = await channel.sendMessage("<b>hi</b>", [
      [{ kind: "link", label: "Open", url: "https://example.com/a" }],
    ]);

    expect(messageId).toBe("77");
    expect(call).toHaveBeenCalledWith(
      "sendMessage",
      {
        chat_id: "-100123",
        text: "<b>hi</b>",
        parse_mode: "HTML",
        reply_markup: {
          inline_keyboard: [[{ text: "Open", url: "https://example.com/a" }]],
        },
      },
      expect.anything(),
    );
  });

  it("should omit reply_markup when no controls are given", async () => {
    const call = vi.fn().mockResolvedValue({ message_id: 1 });
    const channel = createTelegramChannel(call, "-100123");

    await channel.sendMessage("plain");

    expect(call).toHaveBeenCalledWith(
      "sendMessage",
      { chat_id: "-100123", text: "plain", parse_mode: "HTML" },
      expect.anything(),
    );
  });

  it("should edit the reply markup of a numeric message id", async () => {
    const call = vi.fn().mockResolvedValue(true);
    const channel = createTelegramChannel(call, "-100123");

    await channel.editMessageControls("77", [
      [{ kind: "callback", label: "👍 1", data: "like" }],
    ]);

    expect(call).toHaveBeenCalledWith(
      "editMessageReplyMarkup",
      {
        chat_id: "-100123",
        message_id: 77,
        reply_markup: { inline_keyboard: [[{ text: "👍 1", callback_data: "like" }]] },
      },
      expect.anything(),
    );
  });

  it("should ignore 'message is not modified' errors on edit", async () => {
    const call = vi
      .fn()
      .mockRejectedValue(
        new ChatApiError(
          "editMessageReplyMarkup",
          "Bad Request: message is not modified",
        ),
      );
    const channel = createTelegramChannel(call, "-100123");

    await expect(channel.editMessageControls("77", [])).resolves.toBeUndefined();
  });

  it("should propagate other edit errors", async () => {
    const call = vi
      .fn()
      .mockRejectedValue(
        new ChatApiError("editMessageReplyMarkup", "Bad Request: message to edit not found"),
      );
    const channel = createTelegramChannel(call, "-100123");

    await expect(channel.editMessageControls("77", [])).rejects.toThrow(
      "message to edit not found",
    );
  });
});
