import { inputPort, portsOf, type NodeModel } from './node-model';

/** Models of the nodes the engine implements itself */
export const BUILTIN_MODELS: readonly NodeModel[] = [
    { kind: 'Control', registrationId: 'Sequence', ports: portsOf() },
    { kind: 'Control', registrationId: 'ReactiveSequence', ports: portsOf() },
    { kind: 'Control', registrationId: 'Fallback', ports: portsOf() },
    { kind: 'Control', registrationId: 'ReactiveFallback', ports: portsOf() },
    {
        kind: 'Control',
        registrationId: 'Parallel',
        ports: portsOf(
            inputPort('success_threshold', 'int32', '-1'),
            inputPort('failure_threshold', 'int32', '1'),
        ),
    },
    { kind: 'Decorator', registrationId: 'Inverter', ports: portsOf() },
    { kind: 'Decorator', registrationId: 'ForceSuccess', ports: portsOf() },
    { kind: 'Decorator', registrationId: 'ForceFailure', ports: portsOf() },
    { kind: 'Decorator', registrationId: 'Repeat', ports: portsOf(inputPort('num_cycles', 'int32')) },
    {
        kind: 'Decorator',
        registrationId: 'RetryUntilSuccessful',
        ports: portsOf(inputPort('num_attempts', 'int32')),
    },
    { kind: 'Action', registrationId: 'AlwaysSuccess', ports: portsOf() },
    { kind: 'Action', registrationId: 'AlwaysFailure', ports: portsOf() },
];

/** Registration IDs that some tree files spell differently */
export const BUILTIN_ALIASES: ReadonlyMap<string, string> = new Map([
    ['RetryUntilSuccesful', 'RetryUntilSuccessful'],
    ['Selector', 'Fallback'],
]);
