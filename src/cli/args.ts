export function arg(name: string, fallback?: string, argv: readonly string[] = process.argv): string | undefined {
  const prefix = `--${name}=`;
  const row = argv.find((entry) => entry.startsWith(prefix));
  if (!row) return fallback;
  return row.slice(prefix.length);
}

export function boolArg(name: string, fallback: boolean, argv: readonly string[] = process.argv): boolean {
  const raw = arg(name, undefined, argv);
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new Error(`Invalid --${name}=${raw}. Use true or false.`);
}

export function buildingArg(fallback: number, argv: readonly string[] = process.argv): number {
  const raw = arg("building", undefined, argv);
  if (raw === undefined) return fallback;
  const parsed = Number(raw.trim());
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > 99) {
    throw new Error(`Invalid --building=${raw}. Use a building number such as 3.`);
  }
  return parsed;
}
