import { timingSafeEqual } from "node:crypto";
import { createMiddleware } from "hono/factory";
import type { Address } from "../types";
import { isAddress, normalizeAddress } from "../utils/address";
import { UnauthorizedError } from "../services/errors";

export type AppEnv = {
  Variables: {
    actor: Address | null;
  };
};

export interface ActorOptions {
  administrator: Address;
  adminApiKey: string;
}

function tokenMatches(candidate: string, expected: string): boolean {
  const a = Buffer.from(candidate);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Resolves who is calling. A bearer token equal to the admin API key makes
 * the caller the administrator; otherwise `X-Actor-Address` names the caller.
 * Claiming the administrator address without the token is refused.
 */
export const actor = (options: ActorOptions) => {
  const administrator = normalizeAddress(options.administrator);

  return createMiddleware<AppEnv>(async (c, next) => {
    const authorization = c.req.header("authorization");
    if (authorization !== undefined) {
      const token = authorization.replace(/^Bearer\s+/i, "");
      if (!tokenMatches(token, options.adminApiKey)) {
        throw new UnauthorizedError("Invalid API key", 401);
      }
      c.set("actor", administrator);
      return await next();
    }

    const claimed = c.req.header("x-actor-address");
    if (claimed === undefined) {
      c.set("actor", null);
      return await next();
    }
    if (!isAddress(claimed)) {
      throw new UnauthorizedError("X-Actor-Address is not a valid address", 401);
    }
    const address = normalizeAddress(claimed);
    if (address === administrator) {
      throw new UnauthorizedError("Administrator calls require the API key", 401);
    }
    c.set("actor", address);
    await next();
  });
};
