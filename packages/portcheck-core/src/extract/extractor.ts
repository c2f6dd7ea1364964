import { DeclaredSymbol, Extraction, SymbolKind } from '../types/index.js';
import { FileScanner } from '../utils/scanner.js';
import { errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export type DeclarationMarkers = Extraction;

export const DEFAULT_MARKERS: DeclarationMarkers = {
    function_marker: 'def ',
    class_marker: 'class ',
    private_prefix: '_',
};

export interface Declaration {
    name: string;
    kind: SymbolKind;
}

export interface ModuleExtraction {
    symbols: DeclaredSymbol[];
    error?: string;
}

function cutAtFirst(text: string, stops: string[]): string {
    let end = text.length;
    for (const stop of stops) {
        const index = text.indexOf(stop);
        if (index !== -1 && index < end) end = index;
    }
    return text.substring(0, end);
}

/**
 * Classifies one already-stripped line. Purely textual: any line starting with
 * a marker counts, whatever it was nested in before stripping.
 */
export function classifyLine(stripped: string, markers: DeclarationMarkers = DEFAULT_MARKERS): Declaration | undefined {
    const fn = markers.function_marker;
    if (stripped.startsWith(fn)) {
        if (stripped.startsWith(fn + markers.private_prefix)) {
            return undefined;
        }
        return { name: cutAtFirst(stripped.substring(fn.length), ['(']), kind: 'function' };
    }

    const cls = markers.class_marker;
    if (stripped.startsWith(cls)) {
        return { name: cutAtFirst(stripped.substring(cls.length), ['(', ':']), kind: 'class' };
    }

    return undefined;
}

/** Declared symbols of a reference file, in file order. */
export function extractSymbols(text: string, module: string, markers: DeclarationMarkers = DEFAULT_MARKERS): DeclaredSymbol[] {
    const symbols: DeclaredSymbol[] = [];
    for (const line of text.split('\n')) {
        const declaration = classifyLine(line.trim(), markers);
        if (declaration) {
            symbols.push({ ...declaration, module });
        }
    }
    return symbols;
}

export async function extractModule(filePath: string, module: string, markers: DeclarationMarkers = DEFAULT_MARKERS): Promise<ModuleExtraction> {
    let text: string;
    try {
        text = await FileScanner.readText(filePath);
    } catch (error) {
        const message = errorMessage(error);
        Logger.debug(`Could not read reference module ${module}: ${message}`);
        return { symbols: [], error: message };
    }
    return { symbols: extractSymbols(text, module, markers) };
}
