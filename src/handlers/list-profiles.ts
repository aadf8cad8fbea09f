import type { HandlerDeps } from "./types.js";
import type { ToolProfile } from "../engine/types.js";
import type { ListProfilesArgs } from "../schemas/tools.js";
import { rendererName } from "../engine/renderers.js";
import { formatResponse } from "../response.js";

export function describeProfile(p: ToolProfile) {
  return {
    name: p.name,
    description: p.description,
    strategy: p.strategy.kind,
    renderer: rendererName(p.strategy.kind, p.renderer),
    commands: p.commands,
    tags: p.tags ?? [],
  };
}

export async function handleListProfiles(deps: HandlerDeps, args: ListProfilesArgs) {
  const startTime = Date.now();
  const profiles = args.tag ? deps.registry.byTag(args.tag) : deps.registry.all();

  return formatResponse("list_profiles", {
    profiles: profiles.map(describeProfile),
    count: profiles.length,
  }, startTime);
}
