import { AppError } from "../errors";

/**
 * Race `work` against a timer. The work itself is not cancelled; callers
 * that need it stopped pass it their own abort signal.
 */
export async function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new AppError({ code: "TIMEOUT", message: `${label} timed out after ${ms}ms` }));
    }, ms);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
