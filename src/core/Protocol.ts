/**
 * Wire protocol for the actuator controller.
 *
 * Every command is one ASCII character with no framing and no acknowledgement.
 * The table below is the only place characters are defined; everything else
 * goes through `encode`/`decode`.
 */

export enum ActuatorId {
    LeftDrive = 'left-drive',
    RightDrive = 'right-drive',
    Arm1 = 'arm1',
    Arm2 = 'arm2',
    Arm3 = 'arm3',
    Led = 'led'
}

/** The addressable units of the protocol. Drive moves both wheels together. */
export enum ControlGroup {
    Drive = 'drive',
    Arm1 = 'arm1',
    Arm2 = 'arm2',
    Arm3 = 'arm3',
    Led = 'led'
}

export enum Action {
    Forward = 'forward',
    Backward = 'backward',
    Left = 'left',
    Right = 'right',
    Down = 'down',
    Up = 'up',
    Clockwise = 'clockwise',
    CounterClockwise = 'counter-clockwise',
    Toggle = 'toggle',
    Stop = 'stop',
    EmergencyStop = 'emergency-stop'
}

export type CommandChar =
    | 'F' | 'B' | 'L' | 'R' | '0'
    | 'A' | 'Z' | 'a'
    | 'S' | 'X' | 's'
    | 'C' | 'V' | 'c'
    | 'Q'
    | '!';

export const EMERGENCY_STOP: CommandChar = '!';

export interface ProtocolEntry {
    char: CommandChar;
    group: ControlGroup | null;
    action: Action;
}

export const PROTOCOL_TABLE: readonly ProtocolEntry[] = [
    { char: 'F', group: ControlGroup.Drive, action: Action.Forward },
    { char: 'B', group: ControlGroup.Drive, action: Action.Backward },
    { char: 'L', group: ControlGroup.Drive, action: Action.Left },
    { char: 'R', group: ControlGroup.Drive, action: Action.Right },
    { char: '0', group: ControlGroup.Drive, action: Action.Stop },
    { char: 'A', group: ControlGroup.Arm1, action: Action.Down },
    { char: 'Z', group: ControlGroup.Arm1, action: Action.Up },
    { char: 'a', group: ControlGroup.Arm1, action: Action.Stop },
    { char: 'S', group: ControlGroup.Arm2, action: Action.Down },
    { char: 'X', group: ControlGroup.Arm2, action: Action.Up },
    { char: 's', group: ControlGroup.Arm2, action: Action.Stop },
    { char: 'C', group: ControlGroup.Arm3, action: Action.Clockwise },
    { char: 'V', group: ControlGroup.Arm3, action: Action.CounterClockwise },
    { char: 'c', group: ControlGroup.Arm3, action: Action.Stop },
    { char: 'Q', group: ControlGroup.Led, action: Action.Toggle },
    { char: '!', group: null, action: Action.EmergencyStop }
];

export const GROUP_MEMBERS: Readonly<Record<ControlGroup, readonly ActuatorId[]>> = {
    [ControlGroup.Drive]: [ActuatorId.LeftDrive, ActuatorId.RightDrive],
    [ControlGroup.Arm1]: [ActuatorId.Arm1],
    [ControlGroup.Arm2]: [ActuatorId.Arm2],
    [ControlGroup.Arm3]: [ActuatorId.Arm3],
    [ControlGroup.Led]: [ActuatorId.Led]
};

const byChar = new Map<string, ProtocolEntry>(PROTOCOL_TABLE.map(entry => [entry.char, entry]));

export function isCommandChar(value: string): value is CommandChar {
    return byChar.has(value);
}

export function decode(char: string): ProtocolEntry | undefined {
    return byChar.get(char);
}

/**
 * Character for an (group, action) pair, or undefined when the protocol has no
 * such command (e.g. `Up` on the drive).
 */
export function encode(group: ControlGroup | null | undefined, action: Action): CommandChar | undefined {
    if (action === Action.EmergencyStop) return EMERGENCY_STOP;
    const entry = PROTOCOL_TABLE.find(e => e.group === group && e.action === action);
    return entry?.char;
}

export function stopCharForGroup(group: ControlGroup): CommandChar | null {
    return encode(group, Action.Stop) ?? null;
}

export function groupOf(actuator: ActuatorId): ControlGroup {
    switch (actuator) {
        case ActuatorId.LeftDrive:
        case ActuatorId.RightDrive:
            return ControlGroup.Drive;
        case ActuatorId.Arm1:
            return ControlGroup.Arm1;
        case ActuatorId.Arm2:
            return ControlGroup.Arm2;
        case ActuatorId.Arm3:
            return ControlGroup.Arm3;
        case ActuatorId.Led:
            return ControlGroup.Led;
    }
}

export function isMotionAction(action: Action): boolean {
    return action !== Action.Stop && action !== Action.Toggle && action !== Action.EmergencyStop;
}
