// tests/unit/base_module.test.ts

import { BaseModule } from '../../src/core/modules/BaseModule';
import { ModuleManager } from '../../src/core/modules/ModuleManager';
import { CallContext, ModuleFunctions } from '../../src/core/modules/types';
import { Logger } from '../../src/core/logging/Logger';

class Greeter extends BaseModule {
    public contexts: CallContext[] = [];
    public failActivation = false;

    constructor(name: string, functions: ModuleFunctions) {
        super(name, functions);
        this.on('greet', ({ who }, context) => {
            this.contexts.push(context);
            return `hello ${String(who)}`;
        });
        this.on('activate', async () => {
            if (this.failActivation) {
                throw new Error('not today');
            }
        });
    }

    public metadata() {
        return this.createMetadata();
    }
}

describe('BaseModule', () => {
    const functions = new ModuleManager().functionReferences;
    let greeter: Greeter;

    beforeEach(() => {
        greeter = new Greeter('greeter', functions);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should dispatch registered handlers by name', async () => {
        await expect(greeter.callMethod('greet', { who: 'bob' })).resolves.toBe('hello bob');
        expect(greeter.hasMethod('greet')).toBe(true);
        expect(greeter.hasMethod('wave')).toBe(false);
    });

    it('should pass the module and the call signal to handlers', async () => {
        const controller = new AbortController();
        await greeter.callMethod('greet', { who: 'ann' }, { signal: controller.signal });

        expect(greeter.contexts[0].module).toBe(greeter);
        expect(greeter.contexts[0].signal).toBe(controller.signal);
    });

    it('should walk through the lifecycle states without handlers', async () => {
        expect(greeter.lifecycleState).toBe('created');

        await greeter.callMethod('startup');
        expect(greeter.lifecycleState).toBe('started');
        expect(greeter.isReady).toBe(false);

        await greeter.callMethod('activate');
        expect(greeter.lifecycleState).toBe('active');
        expect(greeter.isReady).toBe(true);

        await greeter.callMethod('deactivate');
        expect(greeter.lifecycleState).toBe('inactive');

        await greeter.callMethod('initiate_shutdown');
        expect(greeter.lifecycleState).toBe('stopping');

        await greeter.callMethod('finalize_shutdown');
        expect(greeter.lifecycleState).toBe('stopped');
        expect(greeter.isReady).toBe(false);
    });

    it('should not advance the state when a lifecycle handler fails', async () => {
        greeter.failActivation = true;

        await expect(greeter.callMethod('activate')).rejects.toThrow('not today');
        expect(greeter.lifecycleState).toBe('created');
    });

    it('should log unknown methods and resolve to undefined', async () => {
        const errorSpy = jest.spyOn(Logger, 'error').mockImplementation(() => undefined);

        await expect(greeter.callMethod('wave', { times: 2 })).resolves.toBeUndefined();
        expect(errorSpy).toHaveBeenCalledWith('greeter', 'Unknown method [greeter.wave({"times":2})]');
    });

    it('should stay silent about unknown methods when asked to', async () => {
        const errorSpy = jest.spyOn(Logger, 'error').mockImplementation(() => undefined);

        await expect(greeter.callMethod('on_anything', {}, { logUnknown: false })).resolves.toBeUndefined();
        expect(errorSpy).not.toHaveBeenCalled();
    });

    it('should create metadata naming itself as the source', () => {
        const metadata = greeter.metadata();

        expect(metadata.sourceName).toBe('greeter');
        expect(metadata.isFrom(greeter)).toBe(true);
        expect(metadata.isFrom(new Greeter('other', functions))).toBe(false);
    });
});
