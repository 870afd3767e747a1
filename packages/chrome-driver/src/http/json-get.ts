import { errorMessage } from "@tabrunner/schemas";
import { ConnectionError } from "../errors.js";

/** HTTP GET that resolves to the parsed JSON body. */
export type FetchJson = (url: string) => Promise<unknown>;

/**
 * Default FetchJson on the global fetch. Transport failures, non-2xx
 * statuses and unparseable bodies all surface as ConnectionError, which is
 * what the readiness poll retries on while the browser is still starting.
 */
export const fetchJson: FetchJson = async (url) => {
  let response: Response;
  try {
    response = await fetch(url);
  } catch (err: unknown) {
    throw new ConnectionError(`GET ${url} failed: ${errorMessage(err)}`, { url });
  }

  if (!response.ok) {
    throw new ConnectionError(`GET ${url} returned HTTP ${response.status}`, { url, status: response.status });
  }

  try {
    return await response.json();
  } catch (err: unknown) {
    throw new ConnectionError(`GET ${url} returned invalid JSON: ${errorMessage(err)}`, { url });
  }
};
