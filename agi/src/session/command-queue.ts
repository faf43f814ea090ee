/**
 * Runs async tasks one at a time in call order. A task that rejects does not
 * block the ones queued behind it.
 */
export class CommandQueue {
    private tail: Promise<void> = Promise.resolve();
    private depth = 0;

    /** tasks queued or running */
    get size(): number {
        return this.depth;
    }

    run<T>(task: () => Promise<T>): Promise<T> {
        this.depth++;
        const result = this.tail.then(task);
        this.tail = result.then(
            () => this.settle(),
            () => this.settle(),
        );
        return result;
    }

    private settle(): void {
        this.depth--;
    }
}
