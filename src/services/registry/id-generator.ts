/**
 * Clinic id minting: `<prefix><YY>-<NNNN>`, continuing after the highest
 * number already issued under the same prefix.
 */

export function idPrefixFor(prefix: string, year: number): string {
  return `${prefix}${String(year % 100).padStart(2, "0")}-`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function maxExistingNumber(
  clinicIds: Iterable<string>,
  prefix: string
): number {
  const pattern = new RegExp(`^${escapeRegExp(prefix)}(\\d+)$`);
  let max = 0;
  for (const clinicId of clinicIds) {
    const match = pattern.exec(clinicId.trim());
    if (match?.[1] === undefined) continue;
    max = Math.max(max, Number.parseInt(match[1], 10));
  }
  return max;
}

export class ClinicIdGenerator {
  private next: number;

  constructor(
    private readonly prefix: string,
    existingIds: Iterable<string>
  ) {
    this.next = maxExistingNumber(existingIds, prefix) + 1;
  }

  mint(): string {
    const id = `${this.prefix}${String(this.next).padStart(4, "0")}`;
    this.next++;
    return id;
  }
}
