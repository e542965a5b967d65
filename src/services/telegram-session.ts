import { TelegramError } from "./errors.js";
import { createLogger } from "./logger.js";
import {
  validatePhoneNumber,
  type Prompt,
  type TelegramCredentials,
  type TelegramCredentialStore,
} from "./telegram-credentials.js";

const log = createLogger("telegram");

export interface SignInPrompts {
  code(): Promise<string>;
  password(hint?: string): Promise<string>;
}

/** The slice of a Telegram client the session commands need. */
export interface TelegramGateway {
  isAuthorized(): Promise<boolean>;
  /** Runs the interactive sign-in and returns the serialized session. */
  signIn(phoneNumber: string, prompts: SignInPrompts): Promise<string>;
  logOut(): Promise<void>;
  close(): Promise<void>;
}

export type TelegramGatewayFactory = (credentials: TelegramCredentials) => TelegramGateway;

export type LoginResult =
  | { status: "already-active"; phoneNumber: string }
  | { status: "logged-in"; phoneNumber: string };

export interface TelegramSessionDeps {
  store: TelegramCredentialStore;
  createGateway: TelegramGatewayFactory;
  prompt: Prompt;
  notify?: (message: string) => void;
}

export class TelegramSessionManager {
  private gateway: TelegramGateway | null = null;
  private credentials: TelegramCredentials | null = null;

  constructor(private readonly deps: TelegramSessionDeps) {}

  get phoneNumber(): string {
    return this.deps.store.read().phoneNumber;
  }

  async verify(): Promise<boolean> {
    const credentials = await this.loadCredentials();
    if (!credentials.session) return false;
    return this.client(credentials).isAuthorized();
  }

  async login(input: string, opts: { force?: boolean } = {}): Promise<LoginResult> {
    const phoneNumber = validatePhoneNumber(input);

    if (await this.verify()) {
      const current = this.phoneNumber;
      if (opts.force) {
        log.info("Forcing login, ending current session", { phoneNumber: current });
        await this.logout();
      } else if (phoneNumber !== current) {
        throw new TelegramError(
          `Active session found for '${current}'. Please logout first (or) use -f/--force flag.`,
          1,
        );
      } else {
        return { status: "already-active", phoneNumber };
      }
    }

    await this.deps.store.write("phoneNumber", phoneNumber);
    this.deps.notify?.(`Starting login procedure for '${phoneNumber}'.`);
    const session = await this.client(await this.loadCredentials()).signIn(phoneNumber, {
      code: () => this.deps.prompt("Enter the login code sent by Telegram: "),
      password: (hint) => this.deps.prompt(hint ? `Enter your 2FA password (hint: ${hint}): ` : "Enter your 2FA password: "),
    });
    await this.deps.store.write("session", session);
    await this.reset();
    log.info("Logged in", { phoneNumber });
    return { status: "logged-in", phoneNumber };
  }

  async logout(opts: { reset?: boolean } = {}): Promise<void> {
    if (!(await this.verify())) {
      throw new TelegramError("No active session found", 7);
    }

    await this.client(await this.loadCredentials()).logOut();
    await this.deps.store.write("session", "");
    await this.reset();

    if (opts.reset) {
      await this.deps.store.write("apiId", "");
      await this.deps.store.write("apiHash", "");
    }
  }

  async close(): Promise<void> {
    await this.reset();
  }

  private async loadCredentials(): Promise<TelegramCredentials> {
    if (!this.credentials) {
      this.credentials = await this.deps.store.ensureApiCredentials(this.deps.prompt);
    }
    return this.credentials;
  }

  private client(credentials: TelegramCredentials): TelegramGateway {
    if (!this.gateway) {
      this.gateway = this.deps.createGateway(credentials);
    }
    return this.gateway;
  }

  // The gateway is bound to the session it was created with; drop it once that changes.
  private async reset(): Promise<void> {
    const gateway = this.gateway;
    this.gateway = null;
    this.credentials = null;
    if (gateway) await gateway.close();
  }
}
