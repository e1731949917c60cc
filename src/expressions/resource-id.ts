/**
 * Resource ID construction and parsing.
 *
 *   /subscriptions/{sub}/resourceGroups/{rg}/providers/{namespace}/{type}/{name}[/{childType}/{childName}...]
 */

export type ResourceTypeAndName = {
  /** Full type, e.g. `Microsoft.Network/virtualNetworks/subnets`. */
  type: string;
  /** Full name, segments joined with `/`, e.g. `vnet1/default`. */
  name: string;
};

/** `Microsoft.Compute/virtualMachines` style: a dotted namespace followed by at least one type segment. */
export function isResourceType(value: string): boolean {
  const segments = value.split("/");
  return segments.length >= 2 && segments[0].includes(".") && segments.every((s) => s.length > 0);
}

/**
 * The provider path `{namespace}/{type}/{name}/...` for a resource. Returns
 * an error message instead when the number of names does not match the
 * number of type segments.
 */
export function providerPath(type: string, names: string[]): { path: string } | { error: string } {
  const [namespace, ...typeSegments] = type.split("/");
  const nameSegments = names.flatMap((n) => n.split("/"));
  if (nameSegments.length !== typeSegments.length) {
    return {
      error: `resource type '${type}' needs ${typeSegments.length} name segment${typeSegments.length === 1 ? "" : "s"}, got ${nameSegments.length}`,
    };
  }
  const parts = [namespace];
  typeSegments.forEach((segment, i) => parts.push(segment, nameSegments[i]));
  return { path: parts.join("/") };
}

export function resourceGroupId(subscriptionId: string, resourceGroup: string): string {
  return `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}`;
}

/**
 * Split a resource reference into type and name. Accepts full resource IDs
 * (anything containing `/providers/`) and `{namespace}/{type}/{name}` paths.
 * Returns null for anything else (e.g. a bare resource name).
 */
export function parseResourceReference(reference: string): ResourceTypeAndName | null {
  const marker = "/providers/";
  const markerIndex = reference.toLowerCase().lastIndexOf(marker);
  const path = markerIndex >= 0 ? reference.slice(markerIndex + marker.length) : reference;

  const segments = path.split("/");
  // namespace + (type, name) pairs
  if (segments.length < 3 || segments.length % 2 === 0 || !segments[0].includes(".")) {
    return null;
  }
  if (segments.some((s) => s.length === 0)) return null;

  const types = [segments[0]];
  const names: string[] = [];
  for (let i = 1; i < segments.length; i += 2) {
    types.push(segments[i]);
    names.push(segments[i + 1]);
  }
  return { type: types.join("/"), name: names.join("/") };
}
