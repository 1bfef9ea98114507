/** Observability Bounded Context — Barrel Export */
export {
    createConsoleSink,
    nullSink,
    getDiagnosticSink,
    setDiagnosticSink,
    withDiagnosticSink,
    silence,
    previewInputs,
    renderValue,
} from './Diagnostics.js';
export type { DiagnosticSink } from './Diagnostics.js';
