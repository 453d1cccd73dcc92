import type { Account } from './model.js';
import type { PacedFetcher } from './pacedFetcher.js';
import type { ResolveResult } from './provider.js';
import type { RunStats } from './stats.js';
import { ProviderError } from '../shared/errors.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';

export interface IdentityPass {
  accounts: Account[];
  /** Lookups that threw a provider error, by username. */
  lookupErrors: Map<string, string>;
}

/**
 * Make sure every account has its upstream id cached before fetching, since
 * fetch-by-handle costs an extra quota unit on every call. Resolved ids are
 * persisted by the fetcher's onIdentityResolved hook as soon as the lookup
 * returns. Failures, including provider errors, leave the account
 * unresolved until the next cycle. A settle delay separates the last lookup
 * from the first content call.
 */
export async function ensureIdentities(
  fetcher: PacedFetcher,
  accounts: Account[],
  stats: RunStats,
  log: Logger = rootLogger,
): Promise<IdentityPass> {
  const lookupErrors = new Map<string, string>();
  const pending = accounts.filter((a) => !a.user_id);
  if (pending.length === 0) return { accounts, lookupErrors };

  const resolvedIds = new Map<string, Pick<Account, 'user_id' | 'display_name' | 'description'>>();

  for (let i = 0; i < pending.length; i++) {
    const account = pending[i];
    if (!account) continue;
    if (i > 0) await fetcher.pause(fetcher.settleDelayMs);

    log.info({ username: account.username }, 'Resolving account identity (first time)');
    let result: ResolveResult;
    try {
      result = await fetcher.resolveAccount(account.username, stats);
    } catch (err) {
      if (!(err instanceof ProviderError)) throw err;
      lookupErrors.set(account.username, err.message);
      log.warn(
        { username: account.username, error: err.message },
        'Identity lookup failed, will retry next run',
      );
      continue;
    }

    if (result.kind === 'ok') {
      resolvedIds.set(account.username, {
        user_id: result.identity.id,
        display_name: result.identity.displayName ?? account.display_name,
        description: result.identity.description ?? account.description,
      });
      log.info({ username: account.username, userId: result.identity.id }, 'Cached account identity');
    } else {
      log.warn(
        { username: account.username, result: result.kind },
        'Could not resolve account identity, will retry next run',
      );
    }
  }

  await fetcher.pause(fetcher.settleDelayMs);

  const updated = accounts.map((a) => {
    const info = resolvedIds.get(a.username);
    return info ? { ...a, ...info } : a;
  });

  const cached = updated.filter((a) => a.user_id).length;
  log.info({ cached, total: updated.length }, 'Account identities ready');
  return { accounts: updated, lookupErrors };
}
