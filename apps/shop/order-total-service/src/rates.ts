export const CANNOT_CONNECT = "Cannot connect to sales tax rate service";
export const CANNOT_READ = "Cannot read response from sales tax rate service";
export const NO_RATE_FOR_ZIP =
  "The zip code in the order does not have a corresponding sales tax rate.";

/** Thrown by lookupRate to preserve the HTTP status the caller should answer with. */
export class RateLookupError extends Error {
  constructor(
    message: string,
    public status: number,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "RateLookupError";
  }
}

export type LookupOptions = {
  timeoutMs: number;
  /** Aborts the outbound call, e.g. when the inbound client goes away. */
  signal?: AbortSignal;
};

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse the rate service's answer. Plain decimal literals only, with no
 * surrounding whitespace; anything that would not fit a 32-bit float is rejected.
 */
export function parseRate(text: string): number | undefined {
  if (!DECIMAL.test(text)) return undefined;
  const rate = Number(text);
  return Number.isFinite(Math.fround(rate)) ? rate : undefined;
}

/** POST the zip code to the rate service and return the rate it answers with. */
export async function lookupRate(
  url: string,
  zip: string,
  options: LookupOptions
): Promise<number> {
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const cancel = () => controller.abort();
  if (options.signal?.aborted) cancel();
  options.signal?.addEventListener("abort", cancel);

  try {
    let response: Response;
    try {
      response = await fetch(url, { method: "POST", body: zip, signal: controller.signal });
    } catch (err) {
      throw new RateLookupError(CANNOT_CONNECT, 500, err);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      // a timeout while reading still counts as the service hanging
      throw new RateLookupError(timedOut ? CANNOT_CONNECT : CANNOT_READ, 500, err);
    }

    const rate = parseRate(text);
    if (rate === undefined) {
      throw new RateLookupError(
        NO_RATE_FOR_ZIP,
        400,
        new Error(`Rate service answered ${JSON.stringify(text)} for zip ${JSON.stringify(zip)}`)
      );
    }
    return rate;
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", cancel);
  }
}
