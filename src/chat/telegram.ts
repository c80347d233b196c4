// pattern: Imperative Shell
import { ProxyAgent } from "undici";
import { z } from "zod";
import { ChatApiError } from "../errors";
import type { ChatChannel, ControlButton, ReplyControls } from "./types";

const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
});

const sentMessageSchema = z.object({
  message_id: z.number().int(),
});

export type TelegramClientOptions = {
  readonly token: string;
  readonly apiBaseUrl: string;
  readonly requestTimeoutMs: number;
  /** HTTP(S) proxy every Bot API request is sent through. */
  readonly proxyUrl?: string;
};

export type CallOptions = {
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
};

/**
 * Calls a Bot API method, returning its validated `result`.
 */
export type TelegramCall = <S extends z.ZodTypeAny>(
  method: string,
  params: Record<string, unknown>,
  resultSchema: S,
  options?: CallOptions,
) => Promise<z.output<S>>;

export function createTelegramClient(options: TelegramClientOptions): TelegramCall {
  const baseUrl = options.apiBaseUrl.replace(/\/+$/, "");
  const dispatcher = options.proxyUrl ? new ProxyAgent(options.proxyUrl) : undefined;

  return async function call<S extends z.ZodTypeAny>(
    method: string,
    params: Record<string, unknown>,
    resultSchema: S,
    callOptions?: CallOptions,
  ): Promise<z.output<S>> {
    const timeout = AbortSignal.timeout(
      callOptions?.timeoutMs ?? options.requestTimeoutMs,
    );
    const signal = callOptions?.signal
      ? AbortSignal.any([callOptions.signal, timeout])
      : timeout;

    let response: Response;
    try {
      response = await fetch(`${baseUrl}/bot${options.token}/${method}`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(params),
        signal,
        ...(dispatcher ? { dispatcher } : {}),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ChatApiError(method, message, { cause: err });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new ChatApiError(method, `HTTP ${response.status}: body is not JSON`);
    }

    const envelope = envelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new ChatApiError(method, `HTTP ${response.status}: unexpected response`);
    }
    if (!response.ok || !envelope.data.ok) {
      throw new ChatApiError(
        method,
        envelope.data.description ?? `HTTP ${response.status}`,
      );
    }

    const result = resultSchema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new ChatApiError(method, "unexpected result shape");
    }
    return result.data;
  };
}

function toInlineButton(button: ControlButton): Record<string, string> {
  return button.kind === "link"
    ? { text: button.label, url: button.url }
    : { text: button.label, callback_data: button.data };
}

export function toInlineKeyboard(controls: ReplyControls): {
  inline_keyboard: Array<Array<Record<string, string>>>;
} {
  return {
    inline_keyboard: controls.map((row) => row.map(toInlineButton)),
  };
}

/**
 * {@link ChatChannel} posting HTML messages with inline keyboards to one
 * Telegram chat.
 */
export function createTelegramChannel(
  call: TelegramCall,
  chatId: string,
): ChatChannel {
  return {
    async sendMessage(text, controls) {
      const message = await call(
        "sendMessage",
        {
          chat_id: chatId,
          text,
          parse_mode: "HTML",
          ...(controls ? { reply_markup: toInlineKeyboard(controls) } : {}),
        },
        sentMessageSchema,
      );
      return String(message.message_id);
    },

    async editMessageControls(messageId, controls) {
      try {
        await call(
          "editMessageReplyMarkup",
          {
            chat_id: chatId,
            message_id: Number(messageId),
            reply_markup: toInlineKeyboard(controls),
          },
          z.unknown(),
        );
      } catch (err) {
        // Re-rendering identical counts is not a failure.
        if (
          err instanceof ChatApiError &&
          err.description.includes("message is not modified")
        ) {
          return;
        }
        throw err;
      }
    },
  };
}
