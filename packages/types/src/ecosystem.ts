export const ECOSYSTEM_NAMES = [
  "npm",
  "yarn",
  "pip",
  "gomod",
  "bundler",
  "cargo",
  "rpm",
  "generic",
] as const;

/** One package-manager universe with its own lockfile format and resolution rules. */
export type EcosystemName = (typeof ECOSYSTEM_NAMES)[number];

export function isEcosystemName(value: unknown): value is EcosystemName {
  return typeof value === "string" && ECOSYSTEM_NAMES.some((name) => name === value);
}

/** Maps an ecosystem to the purl type used for its components. */
export const PURL_TYPES: Readonly<Record<EcosystemName, string>> = {
  npm: "npm",
  yarn: "npm",
  pip: "pypi",
  gomod: "golang",
  bundler: "gem",
  cargo: "cargo",
  rpm: "rpm",
  generic: "generic",
};
