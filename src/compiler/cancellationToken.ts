//
// the host owns a CancellationToken and hands consumers to the analysis; the analysis only ever polls
//
export function CancellationToken() {
    let requested = false;

    function requestCancellation() {
        requested = true;
    }

    function reset() {
        requested = false;
    }

    return {
        requestCancellation,
        reset,
        consumer: CancellationTokenConsumer(() => requested),
    }
}

export type CancellationToken = ReturnType<typeof CancellationToken>;

export class CancellationException {
    name : string;
    constructor() {
        this.name = "CancellationException"; // for debugability, generally want to NOT break on these
    };
}

export function CancellationTokenConsumer(isCancellationRequested: () => boolean) {
    function cancellationRequested() {
        return isCancellationRequested();
    }
    function throwIfCancellationRequested() {
        if (cancellationRequested()) {
            throw new CancellationException();
        }
    }
    return {
        cancellationRequested,
        throwIfCancellationRequested
    }
}

export type CancellationTokenConsumer = ReturnType<typeof CancellationTokenConsumer>;

export const NeverCancelled : CancellationTokenConsumer = CancellationTokenConsumer(() => false);
