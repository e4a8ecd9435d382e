import { UnknownServiceError } from "./errors";
import { SERVICE_NAMES, type ServiceName } from "./types";

/**
 * Immutable mapping from logical service name to base address.
 *
 * Addresses come from configuration; nothing here knows about ports.
 */
export class ServiceRegistry {
  private readonly endpoints: ReadonlyMap<string, string>;

  constructor(endpoints: Partial<Record<ServiceName, string>>) {
    const entries = new Map<string, string>();
    for (const [name, url] of Object.entries(endpoints)) {
      if (typeof url !== "string" || !url.trim()) continue;
      entries.set(name, url.trim().replace(/\/+$/, ""));
    }
    this.endpoints = entries;
  }

  /**
   * Returns the base address for `name` (no trailing slash).
   *
   * @throws UnknownServiceError when the name is not registered.
   */
  resolve(name: string): string {
    const url = this.endpoints.get(name);
    if (url === undefined) throw new UnknownServiceError(name);
    return url;
  }

  has(name: string): boolean {
    return this.endpoints.has(name);
  }

  /**
   * Registered backends, in the fixed pipeline order.
   */
  names(): ServiceName[] {
    return SERVICE_NAMES.filter((n) => this.endpoints.has(n));
  }

  /**
   * Fails fast unless every backend the pipeline needs is registered.
   */
  assertComplete(): void {
    for (const name of SERVICE_NAMES) this.resolve(name);
  }
}
