import type { ServiceDescriptor, ServiceHandler } from './types.js';

interface ServiceEntry {
  descriptor: ServiceDescriptor;
  handler: ServiceHandler;
}

export class ServiceRegistry {
  private readonly entries = new Map<string, ServiceEntry>();

  register(descriptor: ServiceDescriptor, handler: ServiceHandler): void {
    if (this.entries.has(descriptor.name)) {
      throw new Error(`Service already registered: ${descriptor.name}`);
    }
    this.entries.set(descriptor.name, { descriptor, handler });
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): ServiceEntry | undefined {
    return this.entries.get(name);
  }

  list(): ServiceDescriptor[] {
    return [...this.entries.values()].map((entry) => entry.descriptor);
  }
}
