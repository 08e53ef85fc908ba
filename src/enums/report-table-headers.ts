import { defineFamily } from '../core/family';
import { label } from '../core/translation';

export const ReportTableHeaders = defineFamily({
    name: 'ReportTableHeaders',
    kind: 'integer',
    members: { OFF: 0, ROWS_AND_COLUMNS: 1, ROWS: 2, COLUMNS: 3 },
    labels: {
        OFF: label('Off'),
        ROWS_AND_COLUMNS: label('Rows and columns'),
        ROWS: label('Rows'),
        COLUMNS: label('Columns'),
    },
});
