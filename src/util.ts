type ValueOf<T> = T[keyof T];
type Entries<T> = [keyof T, ValueOf<T>][];

// Same as `Object.entries()` but with type inference
export function objectEntries<T extends object>(obj: T): Entries<T> {
  return Object.entries(obj) as Entries<T>;
}

export function sleep(millis: number) {
  return new Promise((resolve) => setTimeout(resolve, millis));
}

export async function inBatchesOf<T>(
  items: T[],
  batchSize: number,
  fn: (batch: T[]) => unknown
) {
  let offset = 0;
  while (offset < items.length) {
    const batch = items.slice(offset, offset + batchSize);
    await fn(batch);
    offset += batchSize;
  }
}

export function formatCommand(command: string, args: string[]) {
  return [command, ...args].join(" ");
}
