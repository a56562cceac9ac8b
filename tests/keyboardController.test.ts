import { beforeEach, describe, expect, it } from 'vitest';
import { CommandGateway } from '../src/core/CommandGateway';
import { EventBus } from '../src/core/EventBus';
import { InputModeCoordinator } from '../src/core/InputModeCoordinator';
import { KeyboardController } from '../src/core/KeyboardController';
import { ControlGroup } from '../src/core/Protocol';
import { VirtualTransport } from '../src/transports/VirtualTransport';
import { FakeLoop } from './support/fakes';

describe('KeyboardController', () => {
    let bus: EventBus;
    let gateway: CommandGateway;
    let link: VirtualTransport;
    let coordinator: InputModeCoordinator;
    let keyboard: KeyboardController;

    beforeEach(async () => {
        bus = new EventBus();
        gateway = new CommandGateway({ bus });
        link = new VirtualTransport({ bus });
        await link.open();
        gateway.attach(link);
        coordinator = new InputModeCoordinator(gateway, { bus, stopOnSwitch: false });
        keyboard = new KeyboardController(gateway, coordinator);
    });

    it('drives while an arrow key is held and stops on release', async () => {
        await keyboard.press('up');
        expect(keyboard.holderOf(ControlGroup.Drive)).toBe('up');
        await keyboard.release('up');

        expect(link.getWritten()).toEqual(['F', '0']);
        expect(keyboard.holderOf(ControlGroup.Drive)).toBeUndefined();
    });

    it('ignores the release of a key that no longer holds the group', async () => {
        await keyboard.press('up');
        await keyboard.press('down');
        const stale = await keyboard.release('up');
        expect(stale).toEqual({ kind: 'ignored' });

        await keyboard.release('down');
        expect(link.getWritten()).toEqual(['F', '0', 'B', '0']);
    });

    it('maps the number keys onto the arms', async () => {
        for (const key of ['1', '4', '3', '6', '0', '2']) {
            await keyboard.press(key);
        }
        expect(link.getWritten()).toEqual(['A', 'a', 'Z', 'S', 's', 'X', 'C', 'c', 'V']);
    });

    it('toggles the LED on press only', async () => {
        await keyboard.press('q');
        const release = await keyboard.release('q');

        expect(release).toEqual({ kind: 'ignored' });
        expect(link.getWritten()).toEqual(['Q']);
    });

    it('sends the emergency stop on escape', async () => {
        await keyboard.press('left');
        const outcome = await keyboard.press('escape');

        expect(outcome.kind).toBe('submitted');
        expect(link.getWritten()).toEqual(['L', '!']);
        expect(keyboard.holderOf(ControlGroup.Drive)).toBeUndefined();
    });

    it('reports unbound keys', async () => {
        expect(await keyboard.press('x')).toEqual({ kind: 'unbound' });
        expect(link.getWritten()).toEqual([]);
    });

    it('suppresses motion keys in voice mode but still honours escape', async () => {
        coordinator.register(new FakeLoop('voice'));
        const toggled = await keyboard.press('v');
        expect(toggled).toEqual({ kind: 'mode', mode: 'voice', switched: true });

        expect(await keyboard.press('up')).toEqual({ kind: 'suppressed' });
        await keyboard.press('escape');
        expect(link.getWritten()).toEqual(['!']);
    });

    it('reports a mode key for an unavailable mode', async () => {
        expect(await keyboard.press('space')).toEqual({ kind: 'mode', mode: 'gesture', switched: false });
        expect(coordinator.mode).toBe('keyboard');
    });
});
