/**
 * Junction standardization
 *
 * A junction runs from the conserved cysteine at the end of the V segment
 * to the conserved F or W of the J motif. Given a locus, the sequence is
 * aligned to the locus's J segments and then its V segments, and each end
 * is trimmed or rebuilt from the reference. Without a locus only the
 * terminal residues are checked.
 *
 * @example
 * ```typescript
 * standardizeJunction("ASSIRSSYEQYF", { locus: "TRB", vSymbol: "TRBV19" }).junction;
 * // "CASSIRSSYEQYF"
 * standardizeJunction("sadaf").junction; // "CSADAFF"
 * ```
 */

import { type } from "arktype";
import { getBundledContext } from "../catalog/bundled";
import type { FamilyCatalog, ReferenceContext } from "../catalog/context";
import type { FailureLogger, LogSettings } from "../core/logging";
import { logWarning } from "../core/logging";
import { CommonValidators, createOptionsValidator } from "../core/validation-utils";
import { ValidationError } from "../errors";
import { JunctionStandardizationResult } from "../results";
import { normalizeSpeciesKey } from "../symbols/cleaning";
import type { GeneFamily, Locus } from "../types";
import { LocusSchema, Species } from "../types";
import { cleanSequence, isAminoAcidSequence } from "./alphabet";
import type { SegmentCandidate } from "./candidates";
import { assertSymbolInLocus, selectCandidates } from "./candidates";
import { resolveSide } from "./correction";
import { alignJ, correctJ } from "./j-side";
import type { ScoringSettings } from "./scoring";
import { NO_ALIGNMENT } from "./scoring";
import { correctLeadingResidue, correctTrailingResidue } from "./terminal-correction";
import { alignV, correctV } from "./v-side";

export interface StandardizeJunctionOptions {
  /** Locus of the chain; when absent it is read from a V or J symbol, if any */
  readonly locus?: Locus;
  /** Defaults to "homosapiens" */
  readonly species?: string;
  /** J gene or allele to align against instead of every J of the locus */
  readonly jSymbol?: string;
  /** V gene or allele to align against instead of every V of the locus */
  readonly vSymbol?: string;
  readonly enforceFunctionalV?: boolean;
  readonly enforceFunctionalJ?: boolean;
  /** Let a miscalled first residue become C */
  readonly allowCCorrection?: boolean;
  /** Let a miscalled last residue become F or W */
  readonly allowFwCorrection?: boolean;
  /** Rebuild more than the conserved cysteine from the V segment */
  readonly allowVReconstruction?: boolean;
  /** Rebuild more than the conserved F/W from the J segment */
  readonly allowJReconstruction?: boolean;
  readonly mismatchPenalty?: number;
  readonly maxJMismatches?: number;
  readonly maxVMismatches?: number;
  readonly minJScore?: number;
  readonly minVScore?: number;
  /** Without a locus, reject rather than wrap a sequence lacking its anchors */
  readonly strict?: boolean;
  readonly logFailures?: boolean;
  readonly logger?: FailureLogger;
  readonly context?: ReferenceContext;
}

export const DEFAULT_STANDARDIZE_JUNCTION_OPTIONS = {
  species: Species.HOMO_SAPIENS,
  enforceFunctionalV: true,
  enforceFunctionalJ: false,
  allowCCorrection: false,
  allowFwCorrection: false,
  allowVReconstruction: false,
  allowJReconstruction: false,
  mismatchPenalty: -1.5,
  maxJMismatches: 1,
  maxVMismatches: 2,
  minJScore: 3,
  minVScore: 2,
  strict: false,
  logFailures: true,
} as const satisfies Required<
  Omit<StandardizeJunctionOptions, "locus" | "jSymbol" | "vSymbol" | "logger" | "context">
>;

const StandardizeJunctionOptionsSchema = type({
  "locus?": "'TRA' | 'TRB' | 'TRG' | 'TRD' | 'TR' | 'IGH' | 'IGK' | 'IGL' | 'IG' | undefined",
  "species?": "string | undefined",
  "jSymbol?": "string | undefined",
  "vSymbol?": "string | undefined",
  "enforceFunctionalV?": "boolean | undefined",
  "enforceFunctionalJ?": "boolean | undefined",
  "allowCCorrection?": "boolean | undefined",
  "allowFwCorrection?": "boolean | undefined",
  "allowVReconstruction?": "boolean | undefined",
  "allowJReconstruction?": "boolean | undefined",
  "mismatchPenalty?": "number | undefined",
  "maxJMismatches?": "number | undefined",
  "maxVMismatches?": "number | undefined",
  "minJScore?": "number | undefined",
  "minVScore?": "number | undefined",
  "strict?": "boolean | undefined",
  "logFailures?": "boolean | undefined",
});

type JunctionOptionsInput = typeof StandardizeJunctionOptionsSchema.infer;

const validateJunctionOptions = createOptionsValidator(StandardizeJunctionOptionsSchema, [
  CommonValidators.nonNegativeIntegers<JunctionOptionsInput>(["maxJMismatches", "maxVMismatches"]),
  (options: JunctionOptionsInput) => {
    if (options.mismatchPenalty !== undefined && options.mismatchPenalty > 0) {
      throw new ValidationError(
        `mismatchPenalty must not be positive, got: ${options.mismatchPenalty}`,
        "The penalty is added to the score for every mismatch"
      );
    }
  },
]);

const CANONICAL_JUNCTION = /^C[A-Z]*[FW]$/;
const MIN_JUNCTION_LENGTH = 4;

function inferLocus(symbol: string): Locus {
  const locus = LocusSchema(symbol.slice(0, 3));
  if (locus instanceof type.errors) {
    throw new ValidationError(
      `Cannot tell the locus of "${symbol}"`,
      "Pass the locus option, or a symbol such as TRBV19 or IGHJ4"
    );
  }
  return locus;
}

function familyOf(locus: Locus): GeneFamily {
  return locus.startsWith("TR") ? "tr" : "ig";
}

interface AlignmentSettings extends ScoringSettings {
  readonly minScore: number;
}

interface SideSettings {
  readonly candidates: readonly SegmentCandidate[];
  readonly selectionError: string | undefined;
  readonly alignment: AlignmentSettings;
}

/**
 * Both sides aligned and corrected, J first
 */
function correctJunction(
  sequence: string,
  j: SideSettings,
  v: SideSettings,
  settings: {
    readonly jSymbol: string | undefined;
    readonly allowCCorrection: boolean;
    readonly allowFwCorrection: boolean;
    readonly allowVReconstruction: boolean;
    readonly allowJReconstruction: boolean;
  }
): { readonly sequence: string; readonly reasons: string[] } {
  const reasons: string[] = [];
  let current = sequence;

  if (j.selectionError !== undefined) {
    reasons.push(j.selectionError);
  } else {
    const scoreJ = (candidate: string) =>
      alignJ(candidate, j.candidates, j.alignment)[0]?.score ?? NO_ALIGNMENT;
    if (settings.allowFwCorrection) {
      current = correctTrailingResidue(current, scoreJ);
    }
    const outcome = resolveSide(current, alignJ(current, j.candidates, j.alignment), {
      side: "J",
      correct: correctJ,
      allowReconstruction: settings.allowJReconstruction,
      preferCanonicalEnd: settings.jSymbol === undefined,
    });
    current = outcome.sequence;
    reasons.push(...outcome.reasons);
  }

  if (v.selectionError !== undefined) {
    reasons.push(v.selectionError);
  } else {
    const scoreV = (candidate: string) =>
      alignV(candidate, v.candidates, v.alignment)[0]?.score ?? NO_ALIGNMENT;
    if (settings.allowCCorrection) {
      current = correctLeadingResidue(current, scoreV);
    }
    const outcome = resolveSide(current, alignV(current, v.candidates, v.alignment), {
      side: "V",
      correct: correctV,
      allowReconstruction: settings.allowVReconstruction,
      preferCanonicalEnd: false,
    });
    current = outcome.sequence;
    reasons.push(...outcome.reasons);
  }

  return { sequence: current, reasons };
}

function sequenceCatalog(
  context: ReferenceContext,
  species: string,
  family: GeneFamily
): FamilyCatalog | undefined {
  const catalog = context.catalogFor(species, family);
  return catalog !== undefined && Object.keys(catalog.sequences).length > 0 ? catalog : undefined;
}

/**
 * Standardize a CDR3 or junction amino-acid sequence
 *
 * Resolution failures are returned in the result and logged as warnings;
 * only malformed arguments throw.
 *
 * @throws {ValidationError} When an option is malformed, or a V or J symbol does not belong to the locus
 */
export function standardizeJunction(
  sequence: string,
  options: StandardizeJunctionOptions = {}
): JunctionStandardizationResult {
  if (typeof sequence !== "string") {
    throw new ValidationError(`Sequence must be a string, got ${typeof sequence}`);
  }

  const { context = getBundledContext(), logger, ...rest } = options;
  const validated = validateJunctionOptions(rest);
  const defaults = DEFAULT_STANDARDIZE_JUNCTION_OPTIONS;
  const species = normalizeSpeciesKey(validated.species ?? defaults.species);
  const { jSymbol, vSymbol } = validated;
  const log: LogSettings = { logFailures: validated.logFailures ?? defaults.logFailures, logger };

  const fail = (error: string, correctedJunction: string | undefined) => {
    logWarning(
      `Failed to standardize junction "${sequence}" for species ${species}: ${error}.` +
        (correctedJunction === undefined ? "" : ` Attempted fix "${correctedJunction}".`),
      { species, locus: validated.locus ?? "none", input: sequence },
      log
    );
    return new JunctionStandardizationResult({ originalInput: sequence, error, correctedJunction });
  };

  const cleaned = cleanSequence(sequence);
  if (!isAminoAcidSequence(cleaned)) {
    return fail("not a valid amino acid sequence", undefined);
  }

  const symbolForLocus = jSymbol ?? vSymbol;
  const locus = validated.locus ?? (symbolForLocus === undefined ? undefined : inferLocus(symbolForLocus));

  if (locus === undefined) {
    const canonical = CANONICAL_JUNCTION.test(cleaned);
    const strict = validated.strict ?? defaults.strict;
    const junction = canonical || strict ? cleaned : `C${cleaned}F`;

    const reasons = canonical || !strict ? [] : ["not a valid junction sequence"];
    if (junction.length < MIN_JUNCTION_LENGTH) {
      reasons.push("junction too short");
    }
    if (reasons.length > 0) {
      return fail(reasons.join("; "), junction);
    }
    return new JunctionStandardizationResult({ originalInput: sequence, correctedJunction: junction });
  }

  if (jSymbol !== undefined) {
    assertSymbolInLocus(jSymbol, locus, "J");
  }
  if (vSymbol !== undefined) {
    assertSymbolInLocus(vSymbol, locus, "V");
  }

  if (!context.species.includes(species)) {
    return fail(`unsupported species: ${species}`, cleaned);
  }
  const catalog = sequenceCatalog(context, species, familyOf(locus));
  if (catalog === undefined) {
    return fail(`unsupported locus ${locus} for species ${species}`, cleaned);
  }

  const mismatchPenalty = validated.mismatchPenalty ?? defaults.mismatchPenalty;
  const jSelection = selectCandidates(catalog, {
    locus,
    side: "J",
    symbol: jSymbol,
    enforceFunctional: validated.enforceFunctionalJ ?? defaults.enforceFunctionalJ,
  });
  const vSelection = selectCandidates(catalog, {
    locus,
    side: "V",
    symbol: vSymbol,
    enforceFunctional: validated.enforceFunctionalV ?? defaults.enforceFunctionalV,
  });

  const corrected = correctJunction(
    cleaned,
    {
      candidates: jSelection.candidates,
      selectionError: jSelection.error,
      alignment: {
        mismatchPenalty,
        maxMismatches: validated.maxJMismatches ?? defaults.maxJMismatches,
        minScore: validated.minJScore ?? defaults.minJScore,
      },
    },
    {
      candidates: vSelection.candidates,
      selectionError: vSelection.error,
      alignment: {
        mismatchPenalty,
        maxMismatches: validated.maxVMismatches ?? defaults.maxVMismatches,
        minScore: validated.minVScore ?? defaults.minVScore,
      },
    },
    {
      jSymbol,
      allowCCorrection: validated.allowCCorrection ?? defaults.allowCCorrection,
      allowFwCorrection: validated.allowFwCorrection ?? defaults.allowFwCorrection,
      allowVReconstruction: validated.allowVReconstruction ?? defaults.allowVReconstruction,
      allowJReconstruction: validated.allowJReconstruction ?? defaults.allowJReconstruction,
    }
  );

  const reasons = [...corrected.reasons];
  if (corrected.sequence.length < MIN_JUNCTION_LENGTH) {
    reasons.push("junction too short");
  }

  if (reasons.length > 0) {
    return fail(reasons.join("; "), corrected.sequence);
  }
  return new JunctionStandardizationResult({
    originalInput: sequence,
    correctedJunction: corrected.sequence,
  });
}
