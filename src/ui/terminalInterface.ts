import readline from 'readline';
import type { Readable, Writable } from 'stream';
import type { Logger } from 'pino';
import type { Credentials } from '../config';
import type { MenuState } from '../menu/menuState';
import type { NoticeKind, UserInterface } from './userInterface';

export interface TerminalInterfaceOptions {
  logger: Logger;
  input?: Readable;
  output?: Writable;
  /** Defaults to whether stdin is a TTY. Prompts resolve null when false. */
  interactive?: boolean;
}

export class TerminalInterface implements UserInterface {
  private readonly logger: Logger;
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly interactive: boolean;
  private lastMenuLine: string | null = null;

  constructor(options: TerminalInterfaceOptions) {
    this.logger = options.logger;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.interactive = options.interactive ?? Boolean(process.stdin.isTTY);
  }

  async promptCredentials(): Promise<Credentials | null> {
    const answers = await this.ask(['Please enter your payroll email: ', 'Please enter your payroll password: ']);
    if (!answers) {
      return null;
    }
    const [email, password] = answers;
    return { email, password };
  }

  async promptTwoFactorCode(): Promise<string | null> {
    const answers = await this.ask(['Please enter your 6-digit verification code: ']);
    return answers ? answers[0] : null;
  }

  alert(message: string): void {
    this.logger.warn({ alert: message }, 'Alert shown');
    this.output.write(`! ${message}\n`);
  }

  notify(kind: NoticeKind, message: string): void {
    this.logger.info({ kind }, message);
    this.output.write(`[${kind}] ${message}\n`);
  }

  renderMenu(menu: MenuState): void {
    const line = `${menu.title} ${menu.timeClockedLabel}`;
    if (line === this.lastMenuLine) {
      return;
    }
    this.lastMenuLine = line;
    this.output.write(`${line}\n`);
  }

  private async ask(questions: string[]): Promise<string[] | null> {
    if (!this.interactive) {
      this.logger.warn('No terminal attached, cannot prompt for input');
      return null;
    }
    const rl = readline.createInterface({ input: this.input, terminal: false });
    const lines = rl[Symbol.asyncIterator]();
    const answers: string[] = [];
    try {
      for (const question of questions) {
        this.output.write(question);
        const next = await lines.next();
        if (next.done) {
          return null;
        }
        answers.push(next.value);
      }
      return answers;
    } finally {
      rl.close();
    }
  }
}
