import { createInterface, Interface } from 'node:readline/promises';

/**
 * Line-based terminal I/O used by the interactive menu
 */
export interface Prompter {
    ask(question: string): Promise<string>;
    print(text: string): void;
    close(): void;
}

/**
 * Raised when stdin ends while the menu is waiting for an answer
 */
export class InputClosedError extends Error {
    constructor() {
        super('Input closed');
        this.name = 'InputClosedError';
    }
}

export class ReadlinePrompter implements Prompter {
    private readonly rl: Interface;
    private closed = false;

    constructor(input: NodeJS.ReadableStream = process.stdin, private readonly output: NodeJS.WritableStream = process.stdout) {
        this.rl = createInterface({ input, output });
        this.rl.once('close', () => {
            this.closed = true;
        });
    }

    ask(question: string): Promise<string> {
        if (this.closed) {
            return Promise.reject(new InputClosedError());
        }

        return new Promise<string>((resolve, reject) => {
            const onClose = () => reject(new InputClosedError());
            this.rl.once('close', onClose);
            this.rl.question(question).then(
                (answer) => {
                    this.rl.off('close', onClose);
                    resolve(answer);
                },
                (error: unknown) => {
                    this.rl.off('close', onClose);
                    reject(error);
                }
            );
        });
    }

    print(text: string): void {
        this.output.write(`${text}\n`);
    }

    close(): void {
        if (!this.closed) {
            this.rl.close();
        }
    }
}
