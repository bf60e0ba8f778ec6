import type { AccessPolicy } from "@circulate/types";
import type { ItemMetadata } from "../src/types.js";

export const STEWARD = "steward";
export const CURATOR = "curator";
export const CUSTODIAN = "branch";

export function accessAs(actor: string, steward: string | null = STEWARD): AccessPolicy {
  return { actor, steward, curators: new Set([CURATOR]) };
}

export const METADATA: ItemMetadata = {
  title: "Field Notes on Moss",
  author: "R. Example",
  contentPointer: "ipfs://content-1",
  license: "CC-BY-4.0",
  contributors: ["illustrator-1"],
};

export const T0 = 1_700_000_000;
