import { describe, expect, it } from 'vitest';
import {
    Action,
    ActuatorId,
    ControlGroup,
    PROTOCOL_TABLE,
    decode,
    encode,
    groupOf,
    isCommandChar,
    isMotionAction,
    stopCharForGroup
} from '../src/core/Protocol';

describe('Protocol', () => {
    it('defines sixteen distinct command characters', () => {
        const chars = PROTOCOL_TABLE.map(entry => entry.char);
        expect(chars).toHaveLength(16);
        expect(new Set(chars).size).toBe(16);
    });

    it('encodes every table entry back to its own character', () => {
        for (const entry of PROTOCOL_TABLE) {
            expect(encode(entry.group, entry.action)).toBe(entry.char);
        }
    });

    it('decodes drive and arm characters', () => {
        expect(decode('L')).toEqual({ char: 'L', group: ControlGroup.Drive, action: Action.Left });
        expect(decode('X')).toEqual({ char: 'X', group: ControlGroup.Arm2, action: Action.Up });
        expect(decode('c')).toEqual({ char: 'c', group: ControlGroup.Arm3, action: Action.Stop });
    });

    it('treats characters as case-sensitive', () => {
        expect(decode('a')?.action).toBe(Action.Stop);
        expect(decode('A')?.action).toBe(Action.Down);
        expect(decode('f')).toBeUndefined();
        expect(isCommandChar('q')).toBe(false);
        expect(isCommandChar('Q')).toBe(true);
    });

    it('has no command for actions a group does not support', () => {
        expect(encode(ControlGroup.Drive, Action.Up)).toBeUndefined();
        expect(encode(ControlGroup.Arm1, Action.Clockwise)).toBeUndefined();
    });

    it('encodes the emergency stop regardless of group', () => {
        expect(encode(null, Action.EmergencyStop)).toBe('!');
        expect(encode(ControlGroup.Arm1, Action.EmergencyStop)).toBe('!');
    });

    it('gives each group its stop character, and none for the LED', () => {
        expect(stopCharForGroup(ControlGroup.Drive)).toBe('0');
        expect(stopCharForGroup(ControlGroup.Arm1)).toBe('a');
        expect(stopCharForGroup(ControlGroup.Arm2)).toBe('s');
        expect(stopCharForGroup(ControlGroup.Arm3)).toBe('c');
        expect(stopCharForGroup(ControlGroup.Led)).toBeNull();
    });

    it('maps both wheels to the drive group', () => {
        expect(groupOf(ActuatorId.LeftDrive)).toBe(ControlGroup.Drive);
        expect(groupOf(ActuatorId.RightDrive)).toBe(ControlGroup.Drive);
        expect(groupOf(ActuatorId.Arm3)).toBe(ControlGroup.Arm3);
    });

    it('classifies motion actions', () => {
        expect(isMotionAction(Action.Forward)).toBe(true);
        expect(isMotionAction(Action.CounterClockwise)).toBe(true);
        expect(isMotionAction(Action.Stop)).toBe(false);
        expect(isMotionAction(Action.Toggle)).toBe(false);
        expect(isMotionAction(Action.EmergencyStop)).toBe(false);
    });
});
