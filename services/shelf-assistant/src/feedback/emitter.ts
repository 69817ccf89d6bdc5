import { createLogger, type Logger } from "../logger.js";

export interface FeedbackEmitter {
  speak(phrase: string): Promise<void>;
}

export class ConsoleFeedbackEmitter implements FeedbackEmitter {
  constructor(private readonly log: Logger = createLogger("speak")) {}

  async speak(phrase: string): Promise<void> {
    this.log.info(phrase);
  }
}
