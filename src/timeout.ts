import { TimeoutError } from './errors';

/**
 * Race `work` against a timer. The timer is always cleared, so a settled
 * call leaves no pending handle behind. The underlying work is not cancelled.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    let timeoutId: NodeJS.Timeout | null = null;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([work, timeoutPromise]);
    } finally {
        if (timeoutId !== null) clearTimeout(timeoutId);
    }
}
