import type { RestApi } from "@aws-sdk/client-api-gateway";
import { DiscoveryError } from "./errors";
import { restApiIdFromArn } from "./identifiers";
import { MAX_REST_API_PAGES, REST_API_PAGE_SIZE, takePages } from "./pagination";
import type { CounterSink, DiscoveryStrategy, TagRecord } from "./types";
import type { TagSources } from "./sources";
import { discoverTaggedResources } from "./tagged";

/**
 * Tagged REST APIs come back from the tagging API under their internal id.
 * Look every REST API up by id and show its configured name instead.
 */
export const discoverApiGateways: DiscoveryStrategy = async (job, region, deps) => {
  const resources = await discoverTaggedResources(job, region, deps);

  let restApis: RestApi[];
  try {
    restApis = await listRestApis(deps.sources, deps.counters.apiGateway);
  } catch (err) {
    console.error(`apigateway discovery in ${region}: listing REST APIs failed:`, err);
    throw new DiscoveryError(job.type, region, resources, { cause: err });
  }

  return resolveRestApiNames(resources, restApis);
};

/**
 * List every REST API in the region, up to MAX_REST_API_PAGES pages.
 * Counted once per listing rather than per page.
 */
export async function listRestApis(
  sources: TagSources,
  counter: CounterSink,
): Promise<RestApi[]> {
  counter.inc();
  const items: RestApi[] = [];
  for await (const page of takePages(sources.getRestApis(REST_API_PAGE_SIZE), MAX_REST_API_PAGES)) {
    items.push(...(page.items ?? []));
  }
  return items;
}

/**
 * Keep only `/restapis` records whose REST API can be found, with `matcher`
 * set to its name. Everything else is dropped.
 */
export function resolveRestApiNames(
  resources: readonly TagRecord[],
  restApis: readonly RestApi[],
): TagRecord[] {
  const names = new Map<string, string>();
  for (const api of restApis) {
    if (api.id !== undefined && api.name !== undefined) {
      names.set(api.id, api.name);
    }
  }

  const resolved: TagRecord[] = [];
  for (const resource of resources) {
    if (!resource.id.includes("/restapis")) continue;

    const restApiId = restApiIdFromArn(resource.id);
    const name = restApiId === undefined ? undefined : names.get(restApiId);
    if (name === undefined) {
      console.error(
        `apigateway: resource=${resource.id} restApiId=${restApiId ?? ""} could not find gateway`,
      );
      continue;
    }
    resolved.push({ ...resource, matcher: name });
  }
  return resolved;
}
