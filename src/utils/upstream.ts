import { AppError, UpstreamServiceError, UpstreamTimeoutError, errorMessage } from "./errors";

/**
 * Run one outbound call to an external service, bounded by a timeout.
 *
 * The call itself is not cancelled when the timer fires; it runs to
 * completion in the background and its result is discarded. No retries
 * happen here beyond whatever the SDK does on its own.
 *
 * Failures come back as UpstreamServiceError (502), timeouts as
 * UpstreamTimeoutError (503). AppErrors thrown inside `call` pass through.
 */
export const callUpstream = async <T>(
  service: string,
  timeoutMs: number,
  call: () => Promise<T>
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new UpstreamTimeoutError(service, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([call(), timeout]);
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw new UpstreamServiceError(service, errorMessage(error));
  } finally {
    clearTimeout(timer);
  }
};
