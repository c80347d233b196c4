export type ControlButton =
  | { readonly kind: "link"; readonly label: string; readonly url: string }
  | { readonly kind: "callback"; readonly label: string; readonly data: string };

/** Rows of buttons attached under a message. */
export type ReplyControls = ReadonlyArray<ReadonlyArray<ControlButton>>;

/**
 * Outbound chat channel. Message ids are opaque strings assigned by the
 * platform.
 */
export interface ChatChannel {
  sendMessage(text: string, controls?: ReplyControls): Promise<string>;
  editMessageControls(messageId: string, controls: ReplyControls): Promise<void>;
}
