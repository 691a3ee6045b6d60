/**
 * luastitch engines command - list engines and their availability
 */

import {
  ENGINES,
  EngineDescriptor,
  PackagingEngine,
  defaultEngineName,
  supportsPlatform,
} from "@luastitch/backend";

export type EngineStatus = "available" | "missing" | "unsupported";

export type EngineListing = {
  readonly name: string;
  readonly status: EngineStatus;
  readonly isDefault: boolean;
};

const STATUS_LABELS: Readonly<Record<EngineStatus, string>> = {
  available: "available",
  missing: "not found",
  unsupported: "unsupported",
};

export const engineStatus = (
  descriptor: EngineDescriptor,
  engine: PackagingEngine
): EngineStatus => {
  if (!supportsPlatform(descriptor, engine.platform)) {
    return "unsupported";
  }
  return engine.probe(descriptor) ? "available" : "missing";
};

export const enginesCommand = (
  engine: PackagingEngine
): readonly EngineListing[] => {
  const fallback = defaultEngineName();
  const listings: EngineListing[] = [];

  console.log("Supported engines:");
  console.log("=".repeat(60));
  for (const descriptor of ENGINES) {
    const listing: EngineListing = {
      name: descriptor.name,
      status: engineStatus(descriptor, engine),
      isDefault: descriptor.name === fallback,
    };
    listings.push(listing);
    const marker = listing.isDefault ? "*" : " ";
    console.log(
      `${marker} ${descriptor.name.padEnd(16)} ${STATUS_LABELS[listing.status].padEnd(12)} ${descriptor.description}`
    );
  }
  console.log("=".repeat(60));
  console.log(`* default engine (${engine.platform})`);

  return listings;
};
