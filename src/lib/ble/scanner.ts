import { CancelledError, DeviceNotFoundError } from "../utils/errors.ts";

/**
 * What a scan result exposes before connecting
 */
export interface Advertisement {
  name: string;
  address: string;
  rssi?: number;
}

export interface ScanFilter {
  /** Advertised name fragment */
  name: string;
  /** Exact address; takes precedence over the name when set */
  address?: string;
}

/**
 * Registers a listener for advertisements and returns a function that
 * stops delivery
 */
export type AdvertisementSource = (
  listener: (advertisement: Advertisement) => void,
) => () => void;

export interface AdvertisementBuffer {
  /** Deliver one advertisement, or hold it until a listener subscribes */
  push(advertisement: Advertisement): void;
  source: AdvertisementSource;
}

/**
 * Source that keeps advertisements reported before anyone subscribed and
 * replays them to the first listener
 */
export function bufferAdvertisements(): AdvertisementBuffer {
  const pending: Advertisement[] = [];
  let listener: ((advertisement: Advertisement) => void) | null = null;

  return {
    push(advertisement) {
      if (listener) {
        listener(advertisement);
      } else {
        pending.push(advertisement);
      }
    },
    source(next) {
      listener = next;
      for (const advertisement of pending.splice(0)) {
        next(advertisement);
      }
      return () => {
        listener = null;
      };
    },
  };
}

/**
 * Lowercase and strip everything but letters and digits, so that
 * "smART Sketcher 2.0" and "smART_Sketcher2.0" compare equal
 */
export function normalizeDeviceName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, "");
}

export function matchesFilter(
  advertisement: Advertisement,
  filter: ScanFilter,
): boolean {
  if (filter.address) {
    return advertisement.address.toLowerCase() === filter.address.toLowerCase();
  }

  const wanted = normalizeDeviceName(filter.name);
  if (!wanted) {
    return false;
  }
  return normalizeDeviceName(advertisement.name).includes(wanted);
}

/**
 * Normalize a UUID for comparison
 *
 * Dashes are removed and the result lowercased. Full 128-bit UUIDs built on
 * the Bluetooth Base UUID (0000XXXX-0000-1000-8000-00805f9b34fb) collapse to
 * their 16-bit short form, which is how the BLE stack reports them.
 */
export function normalizeUUID(uuid: string): string {
  const cleaned = uuid.replace(/-/g, "").toLowerCase();
  const match = cleaned.match(/^0000([0-9a-f]{4})00001000800000805f9b34fb$/);
  if (match && match[1]) {
    return match[1];
  }
  return cleaned;
}

/**
 * Resolve with the first advertisement matching `filter`
 *
 * @throws DeviceNotFoundError when nothing matches within `timeoutMs`
 * @throws CancelledError when `signal` aborts first
 */
export function waitForAdvertisement(
  source: AdvertisementSource,
  filter: ScanFilter,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<Advertisement> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError("Scan cancelled"));
      return;
    }

    let settled = false;
    let unsubscribe: (() => void) | null = null;

    const onAbort = () => {
      if (settled) return;
      finish();
      reject(new CancelledError("Scan cancelled"));
    };

    const finish = () => {
      settled = true;
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
      unsubscribe?.();
    };

    const timeoutId = setTimeout(() => {
      if (settled) return;
      finish();
      const target = filter.address
        ? `address '${filter.address}'`
        : `'${filter.name}'`;
      reject(
        new DeviceNotFoundError(
          `No device matching ${target} within ${timeoutMs / 1000}s`,
        ),
      );
    }, timeoutMs);
    signal?.addEventListener("abort", onAbort, { once: true });

    unsubscribe = source((advertisement) => {
      if (settled || !matchesFilter(advertisement, filter)) return;
      finish();
      resolve(advertisement);
    });

    // The source may have delivered a match synchronously before returning
    // its unsubscribe function.
    if (settled) {
      unsubscribe();
    }
  });
}
