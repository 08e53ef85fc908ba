import { defineFamily } from '../core/family';
import { label } from '../core/translation';

/** What the add-on store does when an update is available */
export const AddonsAutomaticUpdate = defineFamily({
    name: 'AddonsAutomaticUpdate',
    kind: 'string',
    members: {
        NOTIFY: 'notify',
        UPDATE: 'update',
        DISABLED: 'disabled',
    },
    labels: {
        NOTIFY: label('Notify'),
        UPDATE: label('Update Automatically'),
        DISABLED: label('Disabled'),
    },
});
