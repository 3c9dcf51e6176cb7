export interface PurlParts {
  type: string;
  namespace?: string;
  name: string;
  version?: string;
  qualifiers?: Record<string, string | undefined>;
  subpath?: string;
}

function encodeSegment(value: string): string {
  return encodeURIComponent(value).replace(/%3A/gi, ":");
}

function encodeQualifierValue(value: string): string {
  return encodeURIComponent(value).replace(/%3A/gi, ":").replace(/%2F/gi, "/");
}

/**
 * Renders a package URL (`pkg:type/namespace/name@version?qualifiers#subpath`).
 */
export function formatPurl(parts: PurlParts): string {
  let purl = `pkg:${parts.type.toLowerCase()}/`;

  if (parts.namespace !== undefined && parts.namespace.length > 0) {
    purl += parts.namespace.split("/").map(encodeSegment).join("/") + "/";
  }
  purl += encodeSegment(parts.name);

  if (parts.version !== undefined && parts.version.length > 0) {
    purl += `@${encodeSegment(parts.version)}`;
  }

  const qualifiers = Object.entries(parts.qualifiers ?? {})
    .filter((entry): entry is [string, string] => entry[1] !== undefined && entry[1].length > 0)
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));
  if (qualifiers.length > 0) {
    purl += "?" + qualifiers.map(([key, value]) => `${key.toLowerCase()}=${encodeQualifierValue(value)}`).join("&");
  }

  if (parts.subpath !== undefined && parts.subpath.length > 0) {
    purl += "#" + parts.subpath.split("/").filter((segment) => segment.length > 0 && segment !== "." && segment !== "..").map(encodeSegment).join("/");
  }

  return purl;
}

/** npm names: `@scope/name` becomes namespace `@scope`. */
export function npmPurl(name: string, version: string, qualifiers?: Record<string, string | undefined>): string {
  const slash = name.startsWith("@") ? name.indexOf("/") : -1;
  if (slash > 0) {
    return formatPurl({ type: "npm", namespace: name.slice(0, slash), name: name.slice(slash + 1), version, qualifiers });
  }
  return formatPurl({ type: "npm", name, version, qualifiers });
}

/** PEP 503 normalized name. */
export function normalizePypiName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, "-");
}

export function pypiPurl(name: string, version: string, qualifiers?: Record<string, string | undefined>): string {
  return formatPurl({ type: "pypi", name: normalizePypiName(name), version, qualifiers });
}

export function golangPurl(modulePath: string, version: string, qualifiers?: Record<string, string | undefined>): string {
  const slash = modulePath.lastIndexOf("/");
  if (slash < 0) {
    return formatPurl({ type: "golang", name: modulePath, version, qualifiers });
  }
  return formatPurl({
    type: "golang",
    namespace: modulePath.slice(0, slash),
    name: modulePath.slice(slash + 1),
    version,
    qualifiers,
  });
}
