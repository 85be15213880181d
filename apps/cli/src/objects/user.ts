import type {
  AuditProblem,
  UserData,
  UserExport,
  UserSearchResponse,
  UserTokenData,
  UserTokenSearchResponse,
} from '@sqconf/types';
import { createProblem } from '../audit/rules';
import { AuditContext, ageInDays } from '../audit/settings';
import { Platform } from '../platform/platform';
import { RemoteObject } from './types';

/**
 * Users are exported and audited only: recreating them needs credentials
 * an export cannot carry
 */
export class User implements RemoteObject<UserData> {
  readonly kind = 'user' as const;

  constructor(readonly platform: Platform, public payload: UserData) {}

  get key(): string {
    return this.payload.login;
  }

  get name(): string | undefined {
    return this.payload.name;
  }

  cacheFields(): string[] {
    return [this.key];
  }

  url(): string {
    return this.platform.pageUrl(`admin/users?search=${encodeURIComponent(this.key)}`);
  }

  toString(): string {
    return `user '${this.key}'`;
  }

  async tokens(signal?: AbortSignal): Promise<UserTokenData[]> {
    const data = await this.platform.getJson<UserTokenSearchResponse>('user_tokens/search', { login: this.key }, signal);
    return data.userTokens;
  }

  private auditToken(token: UserTokenData, context: AuditContext): AuditProblem[] {
    const { settings, now } = context;
    const age = ageInDays(token.createdAt, now);
    if (age === undefined) return [];
    const problems: AuditProblem[] = [];
    const maxUnusedAge = settings.number('audit.tokens.maxUnusedAge');
    if (age > settings.number('audit.tokens.maxAge')) {
      problems.push(createProblem('TOKEN_TOO_OLD', this, [token.name, age]));
    }
    const unusedAge = ageInDays(token.lastConnectionDate, now);
    if (unusedAge === undefined) {
      if (age > maxUnusedAge) problems.push(createProblem('TOKEN_NEVER_USED', this, [token.name, age]));
    } else if (unusedAge > maxUnusedAge) {
      problems.push(createProblem('TOKEN_UNUSED', this, [token.name, unusedAge]));
    }
    return problems;
  }

  /**
   * Logins listed in `audit.tokens.neverExpire` are service accounts: they
   * are not audited at all
   */
  async audit(context: AuditContext): Promise<AuditProblem[]> {
    const { settings, now, signal } = context;
    if (settings.list('audit.tokens.neverExpire').includes(this.key)) return [];
    const problems = (await this.tokens(signal)).flatMap((token) => this.auditToken(token, context));
    const age = ageInDays(this.payload.lastConnectionDate, now);
    if (age !== undefined && age > settings.number('audit.users.maxLoginAge')) {
      problems.push(createProblem('USER_UNUSED', this, [age]));
    }
    return problems;
  }

  toExport(): UserExport {
    const data: UserExport = {};
    if (this.payload.name) data.name = this.payload.name;
    if (this.payload.email) data.email = this.payload.email;
    if (this.payload.local !== undefined) data.local = this.payload.local;
    if (this.payload.groups && this.payload.groups.length > 0) data.groups = [...this.payload.groups].sort();
    return data;
  }
}

export async function listUsers(platform: Platform, signal?: AbortSignal): Promise<User[]> {
  const users = await platform.searchAll<UserSearchResponse, UserData>(
    'users/search',
    {},
    (page) => ({ items: page.users, paging: page.paging }),
    signal
  );
  return users.map((data) =>
    platform.cache.upsert(
      'user',
      [data.login],
      () => new User(platform, data),
      (user) => {
        user.payload = data;
      }
    )
  );
}
