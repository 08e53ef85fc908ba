import { defineFamily } from '../core/family';
import { label } from '../core/translation';

export const ReportCellBorders = defineFamily({
    name: 'ReportCellBorders',
    kind: 'integer',
    members: { OFF: 0, STYLE: 1, COLOR_AND_STYLE: 2 },
    labels: {
        OFF: label('Off'),
        STYLE: label('Styles'),
        COLOR_AND_STYLE: label('Both Colors and Styles'),
    },
});
