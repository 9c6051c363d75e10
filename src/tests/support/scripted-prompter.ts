import { InputClosedError, Prompter } from '../../cli/prompter';

/**
 * Prompter that answers from a fixed script and records everything printed.
 * Running out of answers behaves like closing stdin.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly printed: string[] = [];
  closed = false;
  private readonly answers: string[];

  constructor(answers: readonly string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new InputClosedError();
    }
    return answer;
  }

  print(text: string): void {
    this.printed.push(text);
  }

  close(): void {
    this.closed = true;
  }

  get remaining(): number {
    return this.answers.length;
  }

  /** Everything printed, as one string */
  output(): string {
    return this.printed.join('\n');
  }
}
