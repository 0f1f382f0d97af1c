import type { DocumentNode, ParagraphNode, RefDefinition } from "./ast";

/** Plain-data copy of a document, safe to keep after the parse moves on. */
export interface DocumentSnapshot {
    type: "document";
    children: ParagraphNode[];
    refDefinitions: RefDefinition[];
}

export interface DebugSnapshot {
    stage: string;
    ast: DocumentSnapshot;
    logs: string[];
    /** Whether the tree differs from the previous snapshot's. */
    changed: boolean;
}

let debugMode = false;
let debugLogs: string[] = [];
let debugSnapshots: DebugSnapshot[] = [];

export function setDebugMode(enabled: boolean) {
    debugMode = enabled;
}

export function isDebugMode(): boolean {
    return debugMode;
}

export function logDebug(message: string) {
    if (!debugMode) return;
    debugLogs.push(message);
}

export function getDebugSnapshots(): DebugSnapshot[] {
    return debugSnapshots;
}

export function resetDebugState() {
    debugMode = false;
    debugLogs = [];
    debugSnapshots = [];
}

function cloneParagraphs(children: ParagraphNode[]): ParagraphNode[] {
    return children.map((paragraph) => structuredClone(paragraph));
}

function cloneAst(doc: DocumentNode): DocumentSnapshot {
    return {
        type: "document",
        children: cloneParagraphs(doc.children),
        refDefinitions: [...doc.refDefinitions].map((def) => ({ ...def })),
    };
}

export function captureSnapshot(stage: string, doc: DocumentNode) {
    if (!debugMode) return;
    const cloned = cloneAst(doc);
    const previous = debugSnapshots[debugSnapshots.length - 1];
    debugSnapshots.push({
        stage,
        ast: cloned,
        logs: [...debugLogs],
        changed: previous === undefined || JSON.stringify(previous.ast) !== JSON.stringify(cloned),
    });
    debugLogs = [];
}
