import { z } from 'zod';

export const NOT_FOUND = 'NOT FOUND';

export const DiscoverSchema = z.object({
    dir: z.string().default('.'),
    pattern: z.string().optional().default('**/*.py'),
    exclude: z.array(z.string()).optional().default(['**/__init__.py', '**/tests/**']),
    limit: z.number().int().positive().optional().default(10), // bounds report volume
});

export const ReferenceSchema = z.object({
    root: z.string(),
    modules: z.array(z.string()).optional().default([]),
    discover: DiscoverSchema.optional(),
});

export const CandidateRootSchema = z.object({
    root: z.string(),
    extensions: z.array(z.string()).min(1),
});

export const ExtractionSchema = z.object({
    function_marker: z.string().min(1).optional().default('def '),
    class_marker: z.string().min(1).optional().default('class '),
    private_prefix: z.string().min(1).optional().default('_'),
}).optional().default({});

export const PolicySchema = z.enum(['advisory', 'gating']);
export const MatcherKindSchema = z.enum(['substring', 'identifier']);

export const ConfigSchema = z.object({
    version: z.number().default(1),
    reference: ReferenceSchema,
    candidates: z.array(CandidateRootSchema).min(1),
    extraction: ExtractionSchema,
    matcher: MatcherKindSchema.optional().default('substring'),
    search: z.object({
        strategy: z.enum(['index', 'scan']).optional().default('index'),
    }).optional().default({}),
    threshold: z.number().min(0).max(100).optional().default(90),
    // No default; set in the file or by --policy.
    policy: PolicySchema,
    output: z.object({
        missing_functions: z.string().default('missing_functions.json'),
        missing_classes: z.string().default('missing_classes.json'),
        report_path: z.string().default('portcheck-report.json'),
    }).optional().default({}),
});

export type Discover = z.infer<typeof DiscoverSchema>;
export type Reference = z.infer<typeof ReferenceSchema>;
export type CandidateRoot = z.infer<typeof CandidateRootSchema>;
export type Extraction = z.infer<typeof ExtractionSchema>;
export type Policy = z.infer<typeof PolicySchema>;
export type MatcherKind = z.infer<typeof MatcherKindSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type OutputPaths = Config['output'];

export const SymbolKindSchema = z.enum(['function', 'class']);
export type SymbolKind = z.infer<typeof SymbolKindSchema>;

export const SymbolSchema = z.object({
    name: z.string(),
    kind: SymbolKindSchema,
    module: z.string(),
});
export type DeclaredSymbol = z.infer<typeof SymbolSchema>;

export const MatchResultSchema = z.object({
    symbol: SymbolSchema,
    found: z.boolean(),
    location: z.string(),
});
export type MatchResult = z.infer<typeof MatchResultSchema>;

export const ModuleResultSchema = z.object({
    module: z.string(),
    path: z.string(),
    functions: z.array(MatchResultSchema),
    classes: z.array(MatchResultSchema),
    error: z.string().optional(),
});
export type ModuleResult = z.infer<typeof ModuleResultSchema>;

export const MissingItemSchema = z.object({
    name: z.string(),
    module: z.string(),
});
export type MissingItem = z.infer<typeof MissingItemSchema>;

export const CoverageReportSchema = z.object({
    totalFunctions: z.number(),
    implementedFunctions: z.number(),
    totalClasses: z.number(),
    implementedClasses: z.number(),
    missing: z.object({
        functions: z.array(MissingItemSchema),
        classes: z.array(MissingItemSchema),
    }),
    percentage: z.number(),
});
export type CoverageReport = z.infer<typeof CoverageReportSchema>;

export const VerificationResultSchema = z.object({
    generatedAt: z.string(),
    modules: z.array(ModuleResultSchema),
    skipped: z.array(z.string()),
    report: CoverageReportSchema,
    stats: z.object({
        duration_ms: z.number(),
        candidate_files: z.number(),
    }),
});
export type VerificationResult = z.infer<typeof VerificationResultSchema>;

export const OutcomeSchema = z.object({
    pass: z.boolean(),
    percentage: z.number(),
    threshold: z.number(),
    text: z.string(),
    artifacts: z.object({
        missingFunctions: z.string(),
        missingClasses: z.string(),
        report: z.string().optional(),
    }),
});
export type Outcome = z.infer<typeof OutcomeSchema>;

/** Persisted JSON report, the input of `portcheck explain`. */
export const SavedReportSchema = VerificationResultSchema.extend({
    pass: z.boolean(),
    threshold: z.number(),
    policy: PolicySchema,
});
export type SavedReport = z.infer<typeof SavedReportSchema>;
