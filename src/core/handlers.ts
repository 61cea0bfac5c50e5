import type { FormFiller, PlatformHandler } from "../types/collaborators";
import type { Platform } from "../types/jobs";
import { SUPPORTED_PLATFORMS } from "./platformDetector";

export class HandlerRegistry {
  private readonly handlers = new Map<Platform, PlatformHandler>();

  register(handler: PlatformHandler): this {
    if (handler.platform === "unknown") {
      throw new Error("Cannot register a handler for the unknown platform");
    }
    this.handlers.set(handler.platform, handler);
    return this;
  }

  get(platform: Platform): PlatformHandler | undefined {
    return this.handlers.get(platform);
  }

  platforms(): Platform[] {
    return Array.from(this.handlers.keys());
  }
}

/** One handler per platform, each delegating to the shared form filler. */
export function createHandlerRegistry(
  filler: FormFiller,
  platforms: readonly Platform[] = SUPPORTED_PLATFORMS
): HandlerRegistry {
  const registry = new HandlerRegistry();
  for (const platform of platforms) {
    registry.register({
      platform,
      fill: (ctx) => filler.fill(platform, ctx),
      submit: (ctx) => filler.submit(platform, ctx),
    });
  }
  return registry;
}
