import type { MailboxClient } from '../../mail/mailbox';
import { silentLogger, type Logger } from '../../utils/logger';
import { describeError } from '../errors';
import { poll, sleep, type RetryPolicy, type Sleep } from '../retry';
import { selectCode } from './extractor';

export type OTPState = 'idle' | 'waiting' | 'resolved' | 'timed-out';

export type OTPResolution =
  | { state: 'resolved'; code: string; messageId: string }
  | { state: 'timed-out'; attempts: number };

/** Where a verification code comes from: a mailbox, or the person at the terminal. */
export interface CodeSource {
  /** How many codes may be tried before the challenge counts as failed. */
  readonly retries: number;
  resolve(challengeStartedAt: Date): Promise<OTPResolution>;
}

export interface OTPResolverOptions {
  policy: RetryPolicy;
  recencyWindowMinutes: number;
  fromFilter?: string;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => Date;
}

export class OTPResolver implements CodeSource {
  readonly retries = 1;
  private _state: OTPState = 'idle';
  private logger: Logger;
  private wait: Sleep;
  private now: () => Date;

  constructor(private mailbox: MailboxClient, private options: OTPResolverOptions) {
    this.logger = options.logger ?? silentLogger;
    this.wait = options.sleep ?? sleep;
    this.now = options.now ?? (() => new Date());
  }

  get state(): OTPState {
    return this._state;
  }

  async resolve(challengeStartedAt: Date): Promise<OTPResolution> {
    this._state = 'waiting';
    const windowMs = this.options.recencyWindowMinutes * 60_000;

    const outcome = await poll(
      async (attempt) => {
        const since = new Date(
          Math.max(this.now().getTime() - windowMs, challengeStartedAt.getTime() - windowMs)
        );
        try {
          const messages = await this.mailbox.listMessages({ since, from: this.options.fromFilter });
          const recent = messages.filter((m) => m.receivedAt.getTime() >= since.getTime());
          const selected = selectCode(recent);
          if (!selected) {
            this.logger.debug(`No verification code yet (check ${attempt}/${this.options.policy.maxAttempts})`);
          }
          return selected;
        } catch (error) {
          this.logger.warning(`Mailbox check ${attempt} failed: ${describeError(error)}`);
          return undefined;
        }
      },
      this.options.policy,
      this.wait
    );

    if (outcome.status === 'exhausted') {
      this._state = 'timed-out';
      return { state: 'timed-out', attempts: outcome.attempts };
    }

    this._state = 'resolved';
    this.logger.debug(`Verification code found in message ${outcome.value.messageId} (${outcome.value.rule})`);
    return { state: 'resolved', code: outcome.value.code, messageId: outcome.value.messageId };
  }
}
