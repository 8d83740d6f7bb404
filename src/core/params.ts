/**
 * Configuration values that fall back to asking the operator.
 */
import type { Config } from "../config.js";
import { describeError } from "./exceptions.js";
import { type Logger, getLogger } from "./logger.js";
import type { Prompter } from "./prompt.js";

type StringKey = {
  [K in keyof Config]-?: NonNullable<Config[K]> extends string ? K : never;
}[keyof Config];

type BooleanKey = {
  [K in keyof Config]-?: NonNullable<Config[K]> extends boolean ? K : never;
}[keyof Config];

const YES = new Set(["y", "yes", "true", "1", "on"]);
const NO = new Set(["n", "no", "false", "0", "off"]);

export class ParamReader {
  readonly config: Config;
  private prompter: Prompter;
  private logger: Logger;

  constructor(config: Config, prompter: Prompter, logger: Logger = getLogger()) {
    this.config = config;
    this.prompter = prompter;
    this.logger = logger;
  }

  /**
   * Configured value of `key`, else the operator's answer. Null when the
   * answer is blank with no fallback or the prompter could not ask.
   */
  async read(key: StringKey, question: string, fallback?: string): Promise<string | null> {
    const value = this.config[key];
    if (value !== undefined && value !== "") return value;

    const suffix = fallback !== undefined ? ` [${fallback}]` : "";
    const answer = await this.ask(`${question}${suffix}: `);
    if (answer === null) return null;
    if (answer) return answer;
    return fallback ?? null;
  }

  /**
   * Configured boolean, else a yes/no question asked until answered.
   * Rejects when the prompter cannot ask.
   */
  async readBool(key: BooleanKey, question: string, fallback: boolean): Promise<boolean> {
    const value = this.config[key];
    if (value !== undefined) return value;

    const hint = fallback ? "[Y/n]" : "[y/N]";
    for (;;) {
      const answer = (await this.prompter.ask(`${question} ${hint}: `)).toLowerCase();
      if (!answer) return fallback;
      if (YES.has(answer)) return true;
      if (NO.has(answer)) return false;
    }
  }

  /** The operator's secret answer; null when the prompter could not ask. */
  async secret(question: string): Promise<string | null> {
    try {
      return await this.prompter.secret(question);
    } catch (err) {
      this.logger.error(describeError(err));
      return null;
    }
  }

  private async ask(question: string): Promise<string | null> {
    try {
      return await this.prompter.ask(question);
    } catch (err) {
      this.logger.error(describeError(err));
      return null;
    }
  }
}
