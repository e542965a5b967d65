import { Api, TelegramClient, sessions } from "telegram";
import { TELEGRAM_CONNECTION_RETRIES } from "../constants.js";
import { TelegramError } from "../services/errors.js";
import { createLogger } from "../services/logger.js";
import type { TelegramCredentials } from "../services/telegram-credentials.js";
import type { SignInPrompts, TelegramGateway } from "../services/telegram-session.js";

const log = createLogger("telegram-client");

/** TelegramGateway backed by GramJS and a string session. */
export class GramJsGateway implements TelegramGateway {
  private readonly session: sessions.StringSession;
  private readonly client: TelegramClient;
  private connected = false;

  constructor(credentials: TelegramCredentials) {
    this.session = new sessions.StringSession(credentials.session);
    this.client = new TelegramClient(this.session, credentials.apiId, credentials.apiHash, {
      connectionRetries: TELEGRAM_CONNECTION_RETRIES,
    });
  }

  async isAuthorized(): Promise<boolean> {
    await this.connect();
    return this.client.checkAuthorization();
  }

  async signIn(phoneNumber: string, prompts: SignInPrompts): Promise<string> {
    const attempt: { failure: Error | null } = { failure: null };
    try {
      await this.client.start({
        phoneNumber,
        phoneCode: () => prompts.code(),
        password: (hint?: string) => prompts.password(hint),
        onError: (err: Error) => {
          attempt.failure = err;
          log.error("Sign-in failed", { error: err.message });
          return Promise.resolve(true);
        },
      });
    } catch (err) {
      // onError reports the real cause; start() itself only rejects with AUTH_USER_CANCEL.
      const cause: unknown = attempt.failure ?? err;
      const reason = cause instanceof Error ? cause.message : String(cause);
      throw new TelegramError(`Login failed: ${reason}`, 1, cause);
    }
    this.connected = true;
    return this.session.save();
  }

  async logOut(): Promise<void> {
    await this.connect();
    await this.client.invoke(new Api.auth.LogOut());
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    await this.client.destroy();
  }

  private async connect(): Promise<void> {
    if (this.connected) return;
    await this.client.connect();
    this.connected = true;
  }
}

export function createGramJsGateway(credentials: TelegramCredentials): TelegramGateway {
  return new GramJsGateway(credentials);
}
