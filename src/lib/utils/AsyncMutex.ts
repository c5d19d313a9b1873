/**
 * A simple async mutex to ensure exclusive execution of async tasks.
 * While a task is running, other tasks requesting the lock wait in a queue.
 */
export class AsyncMutex {
    private tail: Promise<void> = Promise.resolve();

    /**
     * Executes the given task once every previously queued task has settled.
     * @param execution The async function to execute.
     */
    runExclusive<T>(execution: () => Promise<T>): Promise<T> {
        const result = this.tail.then(execution);
        // The queue advances whether the task resolves or rejects.
        this.tail = result.then(
            () => undefined,
            () => undefined
        );
        return result;
    }
}
