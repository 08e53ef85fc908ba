import type { AnyOptionFamily } from '../core/family';
import { AddonsAutomaticUpdate } from './addons-automatic-update';
import { BrailleMode } from './braille-mode';
import { ModifierKey } from './modifier-key';
import { OutputMode } from './output-mode';
import { ParagraphStartMarker } from './paragraph-start-marker';
import { RemoteConnectionMode } from './remote-connection-mode';
import { RemoteServerType } from './remote-server-type';
import { ReportCellBorders } from './report-cell-borders';
import { ReportLineIndentation } from './report-line-indentation';
import { ReportNotSupportedLanguage } from './report-not-supported-language';
import { ReportTableHeaders } from './report-table-headers';
import { ShowMessages } from './show-messages';
import { TetherTo } from './tether-to';
import { TypingEcho } from './typing-echo';

export * from './types';
export * from './addons-automatic-update';
export * from './braille-mode';
export * from './modifier-key';
export * from './output-mode';
export * from './paragraph-start-marker';
export * from './remote-connection-mode';
export * from './remote-server-type';
export * from './report-cell-borders';
export * from './report-line-indentation';
export * from './report-not-supported-language';
export * from './report-table-headers';
export * from './show-messages';
export * from './tether-to';
export * from './typing-echo';

/** Central registry so settings code can look up a family by its name */
export const optionFamilies: Readonly<Record<string, AnyOptionFamily>> = Object.freeze({
    ModifierKey,
    TypingEcho,
    ShowMessages,
    TetherTo,
    BrailleMode,
    ReportLineIndentation,
    ReportTableHeaders,
    ReportCellBorders,
    AddonsAutomaticUpdate,
    OutputMode,
    ParagraphStartMarker,
    ReportNotSupportedLanguage,
    RemoteConnectionMode,
    RemoteServerType,
});

export function getFamily(name: string): AnyOptionFamily | undefined {
    return Object.prototype.hasOwnProperty.call(optionFamilies, name) ? optionFamilies[name] : undefined;
}
