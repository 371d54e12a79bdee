import { Logger } from '../logging/Logger';
import { ModuleClass, ModuleFunctions, RuntimeModule } from './types';

/**
 * Ordered collection of the modules hosted by one runtime.
 * Owned by the ModuleManager; iteration order is registration order.
 */
export class ModuleRegistry {
    private modules: Map<string, RuntimeModule> = new Map();

    /**
     * Constructs and stores a module. Re-registering a name replaces the
     * previous instance and keeps its position in the ordering.
     */
    public register(name: string, moduleClass: ModuleClass, functions: ModuleFunctions): RuntimeModule {
        const module = new moduleClass(name, functions);
        if (this.modules.has(name)) {
            Logger.warn('ModuleRegistry', `Module ${name} is already registered. Replacing it.`);
        }
        this.modules.set(name, module);
        Logger.debug('ModuleRegistry', `Module ${name} registered.`);
        return module;
    }

    public registerAll(modules: Record<string, ModuleClass>, functions: ModuleFunctions): void {
        for (const [name, moduleClass] of Object.entries(modules)) {
            this.register(name, moduleClass, functions);
        }
    }

    /**
     * Whether a module is registered and in its active state.
     */
    public isReady(name: string): boolean {
        const module = this.modules.get(name);
        if (!module) return false;
        return module.isReady;
    }

    public lookup(name: string): RuntimeModule | undefined {
        return this.modules.get(name);
    }

    public has(name: string): boolean {
        return this.modules.has(name);
    }

    public entries(): Array<[string, RuntimeModule]> {
        return Array.from(this.modules.entries());
    }

    public names(): string[] {
        return Array.from(this.modules.keys());
    }

    public get size(): number {
        return this.modules.size;
    }
}
