import {
    Action,
    ActuatorId,
    CommandChar,
    ControlGroup,
    GROUP_MEMBERS,
    groupOf,
    stopCharForGroup
} from './Protocol';
import { ActuatorSnapshot, ActuatorState } from './types';

const ALL_ACTUATORS: readonly ActuatorId[] = Object.values(ActuatorId);

/**
 * Per-actuator motion state. Pure bookkeeping with no I/O; only the
 * CommandGateway calls it, from inside its critical section.
 */
export class ActuatorStateTracker {
    private states = new Map<ActuatorId, ActuatorState>();
    private stale = false;

    constructor() {
        this.reset();
    }

    public stopCharFor(actuator: ActuatorId): CommandChar | null {
        return stopCharForGroup(groupOf(actuator));
    }

    public isActive(actuator: ActuatorId): boolean {
        return this.get(actuator).active;
    }

    public directionOf(actuator: ActuatorId): Action {
        const state = this.get(actuator);
        return state.active ? state.direction : Action.Stop;
    }

    public record(group: ControlGroup, action: Action): void {
        if (action === Action.Stop) {
            this.recordStop(group);
            return;
        }

        if (group === ControlGroup.Led) {
            const led = this.get(ActuatorId.Led);
            const lit = !led.active;
            this.states.set(ActuatorId.Led, { active: lit, direction: lit ? Action.Toggle : Action.Stop });
            return;
        }

        const members = GROUP_MEMBERS[group];
        const directions = this.memberDirections(group, action);
        members.forEach((actuator, i) => {
            this.states.set(actuator, { active: true, direction: directions[i] });
        });
    }

    public recordStop(group: ControlGroup): void {
        for (const actuator of GROUP_MEMBERS[group]) {
            this.states.set(actuator, { active: false, direction: Action.Stop });
        }
    }

    /** True when every actuator in the group already runs the way `action` would set it. */
    public isEngaged(group: ControlGroup, action: Action): boolean {
        if (action === Action.Stop) return !this.isGroupActive(group);
        if (action === Action.Toggle) return false;

        const directions = this.memberDirections(group, action);
        return GROUP_MEMBERS[group].every((actuator, i) => {
            const state = this.get(actuator);
            return state.active && state.direction === directions[i];
        });
    }

    public isGroupActive(group: ControlGroup): boolean {
        return GROUP_MEMBERS[group].some(actuator => this.get(actuator).active);
    }

    public activeGroups(): ControlGroup[] {
        return Object.values(ControlGroup).filter(group => this.isGroupActive(group));
    }

    public reset(): void {
        for (const actuator of ALL_ACTUATORS) {
            this.states.set(actuator, { active: false, direction: Action.Stop });
        }
        this.stale = false;
    }

    /** Set after a failed write: the physical state no longer matches the table. */
    public markStale(): void {
        this.stale = true;
    }

    public isStale(): boolean {
        return this.stale;
    }

    public snapshot(): ActuatorSnapshot {
        const copy = (actuator: ActuatorId): ActuatorState => ({ ...this.get(actuator) });
        return Object.freeze({
            [ActuatorId.LeftDrive]: copy(ActuatorId.LeftDrive),
            [ActuatorId.RightDrive]: copy(ActuatorId.RightDrive),
            [ActuatorId.Arm1]: copy(ActuatorId.Arm1),
            [ActuatorId.Arm2]: copy(ActuatorId.Arm2),
            [ActuatorId.Arm3]: copy(ActuatorId.Arm3),
            [ActuatorId.Led]: copy(ActuatorId.Led)
        });
    }

    private get(actuator: ActuatorId): ActuatorState {
        return this.states.get(actuator) ?? { active: false, direction: Action.Stop };
    }

    /**
     * Wheels are differential: a left turn runs the left wheel backward and the
     * right wheel forward.
     */
    private memberDirections(group: ControlGroup, action: Action): Action[] {
        if (group !== ControlGroup.Drive) return [action];

        switch (action) {
            case Action.Left:
                return [Action.Backward, Action.Forward];
            case Action.Right:
                return [Action.Forward, Action.Backward];
            default:
                return [action, action];
        }
    }
}
