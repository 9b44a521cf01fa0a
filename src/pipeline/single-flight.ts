interface Flight<T> {
    promise: Promise<T>;
    controller: AbortController;
    waiters: number;
}

/**
 * Shares one in-flight computation between concurrent callers of the same key.
 *
 * The shared work gets its own signal, aborted only once every waiting caller
 * has aborted. A caller that aborts stops waiting immediately. Once a flight is
 * abandoned, the next caller of its key starts fresh work.
 */
export class SingleFlight<T> {
    private readonly flights = new Map<string, Flight<T>>();

    run(key: string, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
        let flight = this.flights.get(key);

        if (!flight) {
            const controller = new AbortController();
            const created: Flight<T> = {
                promise: fn(controller.signal).finally(() => {
                    if (this.flights.get(key) === created) {
                        this.flights.delete(key);
                    }
                }),
                controller,
                waiters: 0,
            };
            this.flights.set(key, created);
            flight = created;
        }

        flight.waiters++;
        return this.wait(key, flight, signal);
    }

    /** Keys with work in flight */
    get size(): number {
        return this.flights.size;
    }

    private wait(key: string, flight: Flight<T>, signal?: AbortSignal): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            const onAbort = () => {
                flight.waiters--;
                if (flight.waiters === 0) {
                    // Later callers must not join work that is being torn down
                    if (this.flights.get(key) === flight) {
                        this.flights.delete(key);
                    }
                    flight.controller.abort(signal?.reason);
                }
                reject(signal?.reason);
            };

            flight.promise.then(
                (value) => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve(value);
                },
                (error: unknown) => {
                    signal?.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );

            if (signal?.aborted) {
                onAbort();
            } else {
                signal?.addEventListener('abort', onAbort, { once: true });
            }
        });
    }
}
