import { isUnauthorizedProviderError } from "../core/errors";
import type { UserRecord } from "../db/users";
import { logger } from "../utils/logger";
import type { AccessTokenProvider } from "../vault/token-broker";

/**
 * One request's view of the user's access token. `run` calls the operation
 * with the current token; on a Drive 401 it force-refreshes and retries that
 * operation once. Only one such retry is allowed for the whole request.
 */
export class RequestTokenScope {
  private accessToken: string | null = null;
  private retried = false;

  constructor(
    private readonly broker: AccessTokenProvider,
    private readonly user: UserRecord,
  ) {}

  async run<T>(operation: (accessToken: string) => Promise<T>): Promise<T> {
    if (this.accessToken === null) {
      this.accessToken = await this.broker.obtain(this.user);
    }
    const accessToken = this.accessToken;

    try {
      return await operation(accessToken);
    } catch (error) {
      if (this.retried || !isUnauthorizedProviderError(error)) {
        throw error;
      }

      this.retried = true;
      logger.warn("drive_unauthorized_force_refresh", { userId: this.user.id });
      this.accessToken = await this.broker.obtain(this.user, { forceRefresh: true });
      return operation(this.accessToken);
    }
  }
}
