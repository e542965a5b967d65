import type { UserEnvironment } from "../src/system/user-environment.js";
import type { TelegramCredentials } from "../src/services/telegram-credentials.js";
import type { SignInPrompts, TelegramGateway } from "../src/services/telegram-session.js";

export class FakeUserEnvironment implements UserEnvironment {
  readonly vars = new Map<string, string>();
  readonly writes: Array<[string, string | null]> = [];

  constructor(initial: Record<string, string> = {}) {
    for (const [k, v] of Object.entries(initial)) this.vars.set(k, v);
  }

  async get(name: string): Promise<string | null> {
    return this.vars.get(name) ?? null;
  }

  async set(name: string, value: string): Promise<void> {
    this.vars.set(name, value);
    this.writes.push([name, value]);
  }

  async remove(name: string): Promise<void> {
    this.vars.delete(name);
    this.writes.push([name, null]);
  }
}

/** In-process Telegram: a session is authorized while it is in `authorized`. */
export class FakeTelegramNetwork {
  readonly authorized = new Set<string>();
  readonly created: TelegramCredentials[] = [];
  readonly signIns: string[] = [];
  readonly logOuts: string[] = [];
  closed = 0;

  factory = (credentials: TelegramCredentials): TelegramGateway => {
    this.created.push(credentials);
    return {
      isAuthorized: async () => this.authorized.has(credentials.session),
      signIn: async (phoneNumber: string, prompts: SignInPrompts) => {
        const code = await prompts.code();
        this.signIns.push(`${phoneNumber}:${code}`);
        const session = `session-${phoneNumber}`;
        this.authorized.add(session);
        return session;
      },
      logOut: async () => {
        this.logOuts.push(credentials.session);
        this.authorized.delete(credentials.session);
      },
      close: async () => {
        this.closed++;
      },
    };
  };
}

export function scriptedPrompt(answers: Record<string, string>) {
  const asked: string[] = [];
  const prompt = async (question: string): Promise<string> => {
    asked.push(question);
    const key = Object.keys(answers).find((k) => question.includes(k));
    if (key === undefined) throw new Error(`Unexpected prompt: ${question}`);
    return answers[key];
  };
  return { prompt, asked };
}
