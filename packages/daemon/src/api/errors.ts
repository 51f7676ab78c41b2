import { TRPCError } from "@trpc/server";
import type { Token, TokenRejection, TokenResult } from "@gatewarden/shared";

const REJECTION_CODES = {
  already_exists: "CONFLICT",
  not_found: "NOT_FOUND",
  invalid_id: "BAD_REQUEST",
  invalid_name: "BAD_REQUEST",
} as const satisfies Record<TokenRejection, TRPCError["code"]>;

const REJECTION_MESSAGES: Record<TokenRejection, (id: string) => string> = {
  already_exists: (id) => `Token ${id} is already registered`,
  not_found: (id) => `Token ${id} not found`,
  invalid_id: (id) => `"${id}" is not a usable token id`,
  invalid_name: () => "Token name must not be empty",
};

/** Returns the token, or throws a TRPCError whose code matches the rejection. */
export function unwrapTokenResult(result: TokenResult, id: string): Token {
  if (result.ok) return result.token;
  throw new TRPCError({
    code: REJECTION_CODES[result.reason],
    message: REJECTION_MESSAGES[result.reason](id),
  });
}
