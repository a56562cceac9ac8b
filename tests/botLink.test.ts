import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { defaultConfig } from '../src/config/ConfigManager';
import { BotLink } from '../src/core/BotLink';
import { EventBus } from '../src/core/EventBus';
import { ScriptedClassifier } from '../src/core/ScriptedClassifier';
import { VirtualTransport } from '../src/transports/VirtualTransport';

describe('BotLink', () => {
    let bus: EventBus;
    let links: VirtualTransport[];
    let bot: BotLink;

    beforeEach(async () => {
        bus = new EventBus();
        links = [];
        bot = new BotLink({ ...defaultConfig(), connectionKind: 'virtual' }, {
            bus,
            createTransport: () => {
                const link = new VirtualTransport({ bus });
                links.push(link);
                return link;
            }
        });
        await bot.start();
    });

    afterEach(async () => {
        await bot.shutdown();
    });

    it('connects using the configured link', () => {
        expect(bot.connections.state()).toEqual({ status: 'connected', kind: 'virtual' });
        expect(bot.getMonitor()).toBeNull();
    });

    it('runs a recognizer through the gateway once its mode is entered', async () => {
        const scripted = new ScriptedClassifier([{ label: 'forward', confidence: 0.9 }]);
        bot.addRecognizer('voice', scripted, scripted, { intervalMs: 1, idleDelayMs: 1 });

        expect(await bot.coordinator.setMode('voice')).toBe(true);
        await vi.waitFor(() => expect(links[0].getWritten()).toEqual(['!', 'F']));
        expect(bot.gateway.pendingDeferredStops()).toEqual(['drive']);
    });

    it('sends a final stop and closes the link on shutdown', async () => {
        await bot.keyboard.press('up');
        await bot.shutdown();

        expect(links[0].getWritten()).toEqual(['F', '!']);
        expect(links[0].isOpen()).toBe(false);
        expect(bot.connections.state().status).toBe('disconnected');
    });

    it('applies new label mappings when the configuration changes', () => {
        const scripted = new ScriptedClassifier([]);
        bot.addRecognizer('voice', scripted, scripted);
        const oldConfig = defaultConfig();

        bus.emit('config:changed', { oldConfig, newConfig: { ...oldConfig, voiceMapping: { go: 'F', halt: '!' } } });

        expect(Array.from(bot.getPolicy('voice')?.getMapping().keys() ?? [])).toEqual(['go', 'halt']);
    });
});
