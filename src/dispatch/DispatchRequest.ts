import { NotFoundError, ValidationError } from '../model/Errors.ts';
import { PRIORITY_LABELS } from '../model/Models.ts';
import { CODE_ABA } from '../rules/AbaRules.ts';
import { composeAlertText, formatLocation } from '../rules/TextComposer.ts';

import type { TaskMap } from '../directory/TaskMap.ts';
import type {
    CalloutAddress,
    DispatchRequest,
    Priority,
    ResolvedCallout,
    TaskSelectionResult,
} from '../model/Models.ts';

export interface DispatchOptions {
    /** Ignored for alarm incidents, which always go out as prio1 */
    priority: Priority;
    comments?: string;
    /** Text placed in the message instead of the incident label */
    incidentText?: string;
    now?: Date;
    autoAddAssistance?: boolean;
}

export type AssistanceOptions = Omit<DispatchOptions, 'incidentText'>;

export interface PreparedDispatch {
    request: DispatchRequest;
    tasks: TaskSelectionResult;
}

const ABA_INCIDENT_TEXT = 'BRANDALARM';
const ABA_PRIORITY: Priority = 'prio1';

/** Incident code used in the message of a manually composed assistance callout */
export const ASSISTANCE_CODE = 'ASSIST';

/**
 * 'ROIL1, ROM1 RK1' → ['ROIL1', 'ROM1', 'RK1']
 */
export function parseManualUnits(raw: string): string[] {
    return raw
        .split(/[\s,]+/)
        .filter((unit) => unit.length > 0);
}

/**
 * Turns a resolved callout into the create-incident payload: message body,
 * priority token, comma-free location and task ids.
 *
 * @throws NotFoundError when a unit has no task id
 * @throws ValidationError when no task id is selected at all
 */
export function buildDispatchRequest(
    resolved: ResolvedCallout,
    taskMap: TaskMap,
    options: DispatchOptions
): PreparedDispatch {
    const isAba = resolved.incidentCode === CODE_ABA;
    const priority = isAba ? ABA_PRIORITY : options.priority;
    const incidentText = options.incidentText ?? (isAba ? ABA_INCIDENT_TEXT : resolved.incidentLabel);

    const body = composeAlertText({
        incidentCode: resolved.incidentCode,
        incidentText,
        addressDisplay: resolved.address.display,
        city: resolved.address.city,
        priority: PRIORITY_LABELS[priority],
        units: resolved.finalUnits,
        comments: options.comments,
        abaSiteName: resolved.abaSite?.name,
    });

    return prepare(resolved.address, body, priority, resolved.finalUnits, taskMap, options);
}

/**
 * Callout with operator-chosen incident text and units, for addresses whose
 * district is unknown. Units may be separated by commas or spaces.
 */
export function buildAssistanceRequest(
    address: CalloutAddress,
    incidentText: string,
    units: string | string[],
    taskMap: TaskMap,
    options: AssistanceOptions
): PreparedDispatch {
    const text = incidentText.trim();
    const unitList = parseManualUnits(typeof units === 'string' ? units : units.join(' '));

    if (!text) {
        throw new ValidationError('Assistance needs an incident text.');
    }
    if (unitList.length === 0) {
        throw new ValidationError('Assistance needs at least one unit.');
    }

    const body = composeAlertText({
        incidentCode: ASSISTANCE_CODE,
        incidentText: text,
        addressDisplay: address.display,
        city: address.city,
        priority: PRIORITY_LABELS[options.priority],
        units: unitList,
        comments: options.comments,
    });

    return prepare(address, body, options.priority, unitList, taskMap, options);
}

function prepare(
    address: CalloutAddress,
    body: string,
    priority: Priority,
    units: string[],
    taskMap: TaskMap,
    options: Pick<DispatchOptions, 'now' | 'autoAddAssistance'>
): PreparedDispatch {
    const tasks = taskMap.selectTaskIdsForUnits(units, options.now ?? new Date(), options.autoAddAssistance ?? true);

    // a callout must reach every unit it names
    if (tasks.missingUnits.length > 0) {
        throw new NotFoundError(`Missing task_id mapping for: ${tasks.missingUnits.join(', ')}`);
    }
    if (tasks.taskIds.length === 0) {
        throw new ValidationError('No task ids selected; nothing to send.');
    }

    return {
        request: {
            body,
            prio: priority,
            location: formatLocation(address.display, address.city),
            taskIds: tasks.taskIds,
        },
        tasks,
    };
}
