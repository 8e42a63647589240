import type {
  AutoScalingGroupPage,
  ResourceTagPage,
  RestApiPage,
  TagSources,
  TransitGatewayAttachmentPage,
} from "../discovery/sources";
import type { CallCounters } from "../discovery/types";

type SourceName = keyof TagSources;

export interface FakeSourceData {
  resourcePages?: ResourceTagPage[];
  autoScalingPages?: AutoScalingGroupPage[];
  transitGatewayPages?: TransitGatewayAttachmentPage[];
  restApiPages?: RestApiPage[];
  /** Throw `error` instead of serving page number `atPage` (0-based). */
  failures?: Partial<Record<SourceName, { atPage: number; error: Error }>>;
}

export interface FakeTagSources extends TagSources {
  /** Pages actually handed out, per listing. */
  served: Record<SourceName, number>;
  resourceTypeFilters: string[][];
  restApiPageSizes: number[];
}

export function fakeTagSources(data: FakeSourceData = {}): FakeTagSources {
  const served: Record<SourceName, number> = {
    getResources: 0,
    describeAutoScalingGroups: 0,
    describeTransitGatewayAttachments: 0,
    getRestApis: 0,
  };

  async function* stream<T>(name: SourceName, pages: readonly T[]): AsyncGenerator<T> {
    const failure = data.failures?.[name];
    for (let i = 0; i < pages.length; i++) {
      if (failure && failure.atPage === i) throw failure.error;
      served[name]++;
      yield pages[i];
    }
    if (failure && failure.atPage >= pages.length) throw failure.error;
  }

  const sources: FakeTagSources = {
    served,
    resourceTypeFilters: [],
    restApiPageSizes: [],
    getResources: (filters) => {
      sources.resourceTypeFilters.push([...filters]);
      return stream("getResources", data.resourcePages ?? []);
    },
    describeAutoScalingGroups: () =>
      stream("describeAutoScalingGroups", data.autoScalingPages ?? []),
    describeTransitGatewayAttachments: () =>
      stream("describeTransitGatewayAttachments", data.transitGatewayPages ?? []),
    getRestApis: (pageSize) => {
      sources.restApiPageSizes.push(pageSize);
      return stream("getRestApis", data.restApiPages ?? []);
    },
  };
  return sources;
}

export interface RecordingCounter {
  count: number;
  inc(): void;
}

export function recordingCounter(): RecordingCounter {
  const counter: RecordingCounter = {
    count: 0,
    inc() {
      counter.count++;
    },
  };
  return counter;
}

export type RecordingCounters = { [K in keyof CallCounters]: RecordingCounter };

export function recordingCounters(): RecordingCounters {
  return {
    tagging: recordingCounter(),
    autoScaling: recordingCounter(),
    apiGateway: recordingCounter(),
    ec2: recordingCounter(),
  };
}

/** One tagging API page per entry, each holding a single resource. */
export function singleResourcePages(count: number, prefix = "i-"): ResourceTagPage[] {
  return Array.from({ length: count }, (_, i) => ({
    ResourceTagMappingList: [
      { ResourceARN: `arn:aws:ec2:eu-west-2:123456789012:instance/${prefix}${i}`, Tags: [] },
    ],
  }));
}
