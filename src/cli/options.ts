import { InvalidArgumentError } from "commander";
import { isStoreName, supportedStores, type StoreName } from "../shared/config/env";
import { MAX_TIMER_DELAY_MS } from "../shared/config/limits";

export const parseSince = (value: string): Date => {
  const since = new Date(value);
  if (Number.isNaN(since.getTime())) {
    throw new InvalidArgumentError("Expected an ISO-8601 timestamp.");
  }
  return since;
};

export const parseTimeout = (value: string): number => {
  const timeout = Number(value);
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidArgumentError("Expected a positive number of milliseconds.");
  }
  if (timeout > MAX_TIMER_DELAY_MS) {
    throw new InvalidArgumentError(`Expected at most ${MAX_TIMER_DELAY_MS} milliseconds.`);
  }
  return timeout;
};

export const parseStore = (value: string): StoreName => {
  if (!isStoreName(value)) {
    throw new InvalidArgumentError(`Expected one of: ${supportedStores.join(", ")}.`);
  }
  return value;
};
