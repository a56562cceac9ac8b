import { beforeEach, describe, expect, it } from 'vitest';
import { ActuatorStateTracker } from '../src/core/ActuatorStateTracker';
import { Action, ActuatorId, ControlGroup } from '../src/core/Protocol';

describe('ActuatorStateTracker', () => {
    let tracker: ActuatorStateTracker;

    beforeEach(() => {
        tracker = new ActuatorStateTracker();
    });

    it('starts with everything stopped', () => {
        const snapshot = tracker.snapshot();
        for (const id of Object.values(ActuatorId)) {
            expect(snapshot[id]).toEqual({ active: false, direction: Action.Stop });
        }
        expect(tracker.activeGroups()).toEqual([]);
    });

    it('runs both wheels forward on a forward command', () => {
        tracker.record(ControlGroup.Drive, Action.Forward);
        expect(tracker.directionOf(ActuatorId.LeftDrive)).toBe(Action.Forward);
        expect(tracker.directionOf(ActuatorId.RightDrive)).toBe(Action.Forward);
    });

    it('turns left by running the left wheel backward and the right wheel forward', () => {
        tracker.record(ControlGroup.Drive, Action.Left);
        expect(tracker.directionOf(ActuatorId.LeftDrive)).toBe(Action.Backward);
        expect(tracker.directionOf(ActuatorId.RightDrive)).toBe(Action.Forward);
        expect(tracker.isEngaged(ControlGroup.Drive, Action.Left)).toBe(true);
        expect(tracker.isEngaged(ControlGroup.Drive, Action.Right)).toBe(false);
    });

    it('treats a stop on an idle group as already engaged', () => {
        expect(tracker.isEngaged(ControlGroup.Arm1, Action.Stop)).toBe(true);
        tracker.record(ControlGroup.Arm1, Action.Up);
        expect(tracker.isEngaged(ControlGroup.Arm1, Action.Stop)).toBe(false);
    });

    it('never reports a toggle as engaged', () => {
        tracker.record(ControlGroup.Led, Action.Toggle);
        expect(tracker.isActive(ActuatorId.Led)).toBe(true);
        expect(tracker.isEngaged(ControlGroup.Led, Action.Toggle)).toBe(false);
        tracker.record(ControlGroup.Led, Action.Toggle);
        expect(tracker.isActive(ActuatorId.Led)).toBe(false);
    });

    it('keeps groups independent', () => {
        tracker.record(ControlGroup.Drive, Action.Forward);
        tracker.record(ControlGroup.Arm2, Action.Down);
        tracker.recordStop(ControlGroup.Drive);
        expect(tracker.activeGroups()).toEqual([ControlGroup.Arm2]);
    });

    it('returns the stop character for an actuator', () => {
        expect(tracker.stopCharFor(ActuatorId.RightDrive)).toBe('0');
        expect(tracker.stopCharFor(ActuatorId.Arm2)).toBe('s');
        expect(tracker.stopCharFor(ActuatorId.Led)).toBeNull();
    });

    it('clears the stale flag on reset', () => {
        tracker.record(ControlGroup.Arm3, Action.Clockwise);
        tracker.markStale();
        expect(tracker.isStale()).toBe(true);
        tracker.reset();
        expect(tracker.isStale()).toBe(false);
        expect(tracker.isGroupActive(ControlGroup.Arm3)).toBe(false);
    });

    it('hands out snapshots that do not follow later changes', () => {
        const before = tracker.snapshot();
        tracker.record(ControlGroup.Arm1, Action.Down);
        expect(before[ActuatorId.Arm1].active).toBe(false);
        expect(tracker.snapshot()[ActuatorId.Arm1]).toEqual({ active: true, direction: Action.Down });
    });
});
