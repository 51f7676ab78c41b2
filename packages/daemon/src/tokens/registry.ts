import type { Token, TokenResult } from "@gatewarden/shared";
import type { EventBus } from "../event-bus.js";
import type { Logger } from "../logger.js";
import { canonicalTokenId, tokenKey } from "./normalize.js";

export interface TokenPersistence {
  saveTokens(tokens: Token[]): void;
}

export interface TokenChanges {
  displayName?: string;
  enabled?: boolean;
}

/**
 * Registered tokens keyed by normalized id, in insertion order.
 * Every successful mutation is written through to the settings file; the
 * in-memory change and the write are not atomic.
 */
export class TokenRegistry {
  private tokens = new Map<string, Token>();

  constructor(
    private persistence: TokenPersistence,
    private eventBus: EventBus,
    private log: Logger,
    initial: Token[] = [],
  ) {
    for (const token of initial) {
      const key = tokenKey(token.id);
      if (!key || this.tokens.has(key)) {
        this.log.warn(`Skipping duplicate or empty token id "${token.id}" in settings`);
        continue;
      }
      this.tokens.set(key, { ...token, id: canonicalTokenId(token.id) });
    }
  }

  register(id: string, displayName: string, enabled = true): TokenResult {
    const key = tokenKey(id);
    if (!key) return { ok: false, reason: "invalid_id" };
    const name = displayName.trim();
    if (!name) return { ok: false, reason: "invalid_name" };
    if (this.tokens.has(key)) {
      this.log.warn(`Token ${id} is already registered`);
      return { ok: false, reason: "already_exists" };
    }

    const token: Token = { id: canonicalTokenId(id), displayName: name, enabled };
    this.tokens.set(key, token);
    this.persist();
    this.log.info(`Registered token: ${token.displayName} (${token.id})`);
    this.eventBus.emit("token:registered", { token: { ...token }, timestamp: Date.now() });
    return { ok: true, token: { ...token } };
  }

  update(id: string, changes: TokenChanges): TokenResult {
    const key = tokenKey(id);
    const existing = this.tokens.get(key);
    if (!existing) return { ok: false, reason: "not_found" };

    const applied: TokenChanges = {};
    if (changes.displayName !== undefined) {
      const name = changes.displayName.trim();
      if (!name) return { ok: false, reason: "invalid_name" };
      applied.displayName = name;
    }
    if (changes.enabled !== undefined) applied.enabled = changes.enabled;

    const token: Token = { ...existing, ...applied };
    this.tokens.set(key, token);
    this.persist();
    this.log.info(`Updated token: ${token.displayName} (${token.id})`);
    this.eventBus.emit("token:updated", { token: { ...token }, changes: applied, timestamp: Date.now() });
    return { ok: true, token: { ...token } };
  }

  unregister(id: string): TokenResult {
    const key = tokenKey(id);
    const existing = this.tokens.get(key);
    if (!existing) {
      this.log.warn(`Token ${id} not found`);
      return { ok: false, reason: "not_found" };
    }

    this.tokens.delete(key);
    this.persist();
    this.log.info(`Unregistered token: ${existing.displayName} (${existing.id})`);
    this.eventBus.emit("token:unregistered", { token: { ...existing }, timestamp: Date.now() });
    return { ok: true, token: { ...existing } };
  }

  get(id: string): Token | undefined {
    const token = this.tokens.get(tokenKey(id));
    return token ? { ...token } : undefined;
  }

  list(): Token[] {
    return Array.from(this.tokens.values(), (t) => ({ ...t }));
  }

  private persist(): void {
    this.persistence.saveTokens(this.list());
  }
}
