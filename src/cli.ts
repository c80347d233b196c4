import { ConfigurationError } from "./errors";

export type Command = { readonly kind: "run" } | { readonly kind: "clear" };

/**
 * No argument runs the service; `clear` resets published state.
 */
export function parseCommand(args: ReadonlyArray<string>): Command {
  if (args.length === 0) return { kind: "run" };
  if (args.length === 1 && args[0] === "clear") return { kind: "clear" };
  throw new ConfigurationError(
    `unknown arguments: ${args.join(" ")} (usage: rss-relay [clear])`,
  );
}
