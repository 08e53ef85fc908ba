import { LoggerProxy, type IDataObject } from 'n8n-workflow';
import type { StorageKind } from '../enums/types';
import type { OptionMember } from './member';

type DescribableFamily = {
    readonly name: string;
    readonly kind: StorageKind;
    readonly continuous: boolean;
    allMembers(): ReadonlyArray<OptionMember>;
};

/**
 * Diagnostics for option families.
 * Output goes through n8n's LoggerProxy, which stays silent until the host calls `LoggerProxy.init`.
 */
export class DebugManager {
    /**
     * Structured snapshot of a family without resolving any label,
     * so it is safe to call before a translation is installed
     */
    static describeFamily(family: DescribableFamily): IDataObject {
        return {
            family: family.name,
            kind: family.kind,
            continuous: family.continuous,
            members: family.allMembers().map((m) => ({
                name: m.name,
                value: m.value,
                composite: m.composite,
                message: m.displayKey.message,
                context: m.displayKey.context ?? null,
            })),
        };
    }

    static logDefinition(family: DescribableFamily): void {
        LoggerProxy.debug(`Defined option family ${family.name}`, {
            kind: family.kind,
            members: family.allMembers().length,
        });
    }
}
