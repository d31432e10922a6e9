/**
 * Service Catalog
 *
 * Static registry of known services. Registration order is the order of the
 * definitions record and is the tie-break used wherever the engine has more
 * than one valid choice.
 */

import {
  UnknownServiceError,
  ValidationError,
  isServiceName,
  uniqueInOrder,
  validateServiceDescriptor,
  type Capability,
  type ServiceDescriptor,
  type ServiceDescriptorInput,
  type ServiceName,
} from '@svcplan/core';
import defaultCatalog from './default-catalog.json';

function toDescriptor(name: ServiceName, input: ServiceDescriptorInput): ServiceDescriptor {
  if (!isServiceName(name)) {
    throw new ValidationError(`Invalid service name '${name}'`, { service: name });
  }
  const validation = validateServiceDescriptor(input);
  if (!validation.valid) {
    throw new ValidationError(
      `Invalid descriptor for service '${name}': ${validation.errorMessage}`,
      { service: name, errors: validation.errors }
    );
  }

  return Object.freeze({
    provides: Object.freeze(uniqueInOrder(input.provides ?? [])),
    requires: Object.freeze(uniqueInOrder(input.requires ?? [])),
    after: Object.freeze(uniqueInOrder(input.after ?? [])),
    conflicts: Object.freeze(uniqueInOrder(input.conflicts ?? [])),
    optional: Object.freeze(uniqueInOrder(input.optional ?? [])),
  });
}

export class ServiceCatalog {
  private readonly descriptors = new Map<ServiceName, ServiceDescriptor>();
  private readonly ranks = new Map<ServiceName, number>();
  // capability -> providers in registration order, built once
  private readonly providerIndex = new Map<Capability, ServiceName[]>();

  /**
   * @throws ValidationError for a malformed name or descriptor
   */
  constructor(definitions: Readonly<Record<ServiceName, ServiceDescriptorInput>>) {
    for (const [name, input] of Object.entries(definitions)) {
      this.ranks.set(name, this.descriptors.size);
      const descriptor = toDescriptor(name, input);
      this.descriptors.set(name, descriptor);

      for (const capability of descriptor.provides) {
        const providers = this.providerIndex.get(capability);
        if (providers) {
          providers.push(name);
        } else {
          this.providerIndex.set(capability, [name]);
        }
      }
    }
  }

  has(name: ServiceName): boolean {
    return this.descriptors.has(name);
  }

  /**
   * @throws UnknownServiceError if the service is not registered
   */
  get(name: ServiceName): ServiceDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new UnknownServiceError(name);
    }
    return descriptor;
  }

  /** All service names in registration order */
  names(): ServiceName[] {
    return [...this.descriptors.keys()];
  }

  get size(): number {
    return this.descriptors.size;
  }

  /**
   * Registration index; unknown services rank after every known one
   */
  rank(name: ServiceName): number {
    return this.ranks.get(name) ?? Number.MAX_SAFE_INTEGER;
  }

  /**
   * Every catalog service providing the capability, enabled or not
   */
  providersOf(capability: Capability): ServiceName[] {
    return [...(this.providerIndex.get(capability) ?? [])];
  }

  /**
   * Sort by registration order. The sort is stable, so unknown services keep
   * their relative input order at the end.
   */
  sortByRank(names: Iterable<ServiceName>): ServiceName[] {
    return [...names].sort((a, b) => this.rank(a) - this.rank(b));
  }

  /**
   * New catalog with entries added or replaced. Replaced entries keep their
   * original rank; new ones are appended.
   */
  extend(definitions: Readonly<Record<ServiceName, ServiceDescriptorInput>>): ServiceCatalog {
    const merged: Record<ServiceName, ServiceDescriptorInput> = {};
    for (const [name, descriptor] of this.descriptors) {
      merged[name] = descriptor;
    }
    for (const [name, input] of Object.entries(definitions)) {
      merged[name] = input;
    }
    return new ServiceCatalog(merged);
  }
}

/**
 * Catalog of the services the project ships descriptors for
 */
export function createDefaultCatalog(): ServiceCatalog {
  return new ServiceCatalog(defaultCatalog);
}
