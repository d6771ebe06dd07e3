import { die } from "./util.js";

export type ModuleId = number;
export type ModulePortId = number;

export type ConfigurableChild = {
  module: ModuleId;
  instance: number;
};

/**
 * Read-only view of the physical module graph. Configurable children are
 * ordered the way their memories are wired in the fabric.
 */
export interface ModuleInstanceTree {
  configurableChildren(module: ModuleId): readonly ConfigurableChild[];
  instanceName(parent: ModuleId, child: ModuleId, instance: number): string;
  findModulePort(module: ModuleId, name: string): ModulePortId | undefined;
  portWidth(port: ModulePortId): number;
  findModule(name: string): ModuleId | undefined;
  moduleName(module: ModuleId): string;
}

type Port = {
  name: string;
  width: number;
};

type Module = {
  name: string;
  ports: Map<string, ModulePortId>;
  // child module -> one entry per instance, holding its explicit name if any
  instances: Map<ModuleId, Array<string | undefined>>;
  // resolved instance names, explicit or generated; one block each
  instanceNames: Set<string>;
  configurable: ConfigurableChild[];
};

export function generateInstanceName(moduleName: string, instance: number): string {
  return `${moduleName}_${instance}_`;
}

export class ModuleManager implements ModuleInstanceTree {
  private readonly modules: Module[] = [];
  private readonly ports: Port[] = [];
  private readonly byName = new Map<string, ModuleId>();

  addModule(name: string): ModuleId {
    if (this.byName.has(name)) die(`Module '${name}' already exists`);
    const id = this.modules.length;
    this.modules.push({ name, ports: new Map(), instances: new Map(), instanceNames: new Set(), configurable: [] });
    this.byName.set(name, id);
    return id;
  }

  /** Instantiate `child` inside `parent`; returns the instance index. */
  addChildModule(parent: ModuleId, child: ModuleId, instanceName?: string): number {
    const p = this.module(parent);
    this.module(child);
    if (parent === child) die(`Module '${p.name}' cannot instantiate itself`);
    const list = p.instances.get(child) ?? [];
    const resolved = instanceName ?? generateInstanceName(this.moduleName(child), list.length);
    if (p.instanceNames.has(resolved)) die(`Module '${p.name}' already has an instance named '${resolved}'`);
    p.instanceNames.add(resolved);
    list.push(instanceName);
    p.instances.set(child, list);
    return list.length - 1;
  }

  setChildInstanceName(parent: ModuleId, child: ModuleId, instance: number, name: string): void {
    const p = this.module(parent);
    const current = this.instanceName(parent, child, instance);
    if (current === name) return;
    if (p.instanceNames.has(name)) die(`Module '${p.name}' already has an instance named '${name}'`);
    p.instanceNames.delete(current);
    p.instanceNames.add(name);
    const list = p.instances.get(child) ?? die(`Module '${p.name}' has no instance ${instance} of '${this.moduleName(child)}'`);
    list[instance] = name;
  }

  addConfigurableChild(parent: ModuleId, child: ModuleId, instance: number): void {
    const p = this.module(parent);
    const list = p.instances.get(child);
    if (!list || instance < 0 || instance >= list.length) {
      die(`Configurable child '${this.moduleName(child)}[${instance}]' is not instantiated in '${p.name}'`);
    }
    if (p.configurable.some((c) => c.module === child && c.instance === instance)) {
      die(`Configurable child '${this.moduleName(child)}[${instance}]' added twice to '${p.name}'`);
    }
    p.configurable.push({ module: child, instance });
  }

  addModulePort(module: ModuleId, name: string, width: number): ModulePortId {
    const m = this.module(module);
    if (m.ports.has(name)) die(`Module '${m.name}' already has a port '${name}'`);
    if (!Number.isInteger(width) || width < 0) die(`Port '${m.name}.${name}' has invalid width ${width}`);
    const id = this.ports.length;
    this.ports.push({ name, width });
    m.ports.set(name, id);
    return id;
  }

  configurableChildren(module: ModuleId): readonly ConfigurableChild[] {
    return this.module(module).configurable;
  }

  instanceName(parent: ModuleId, child: ModuleId, instance: number): string {
    const list = this.module(parent).instances.get(child);
    if (!list || instance >= list.length) {
      die(`Module '${this.moduleName(parent)}' has no instance ${instance} of '${this.moduleName(child)}'`);
    }
    return list[instance] ?? generateInstanceName(this.moduleName(child), instance);
  }

  findModulePort(module: ModuleId, name: string): ModulePortId | undefined {
    return this.module(module).ports.get(name);
  }

  portWidth(port: ModulePortId): number {
    return (this.ports[port] ?? die(`Invalid module port id ${port}`)).width;
  }

  findModule(name: string): ModuleId | undefined {
    return this.byName.get(name);
  }

  moduleName(module: ModuleId): string {
    return this.module(module).name;
  }

  numModules(): number {
    return this.modules.length;
  }

  private module(id: ModuleId): Module {
    return this.modules[id] ?? die(`Invalid module id ${id}`);
  }
}
