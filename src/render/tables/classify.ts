/**
 * Table Classification
 *
 * A table's category is decided by signature text in its first two rows.
 * Signatures are checked in list order and the first hit wins, so the
 * narrower signature must come first wherever two could overlap.
 */

export type RosterCategory =
  | "RankedNeeds"
  | "HouseholdMember"
  | "Savings"
  | "Labor"
  | "Debt"
  | "Land"
  | "Structure"
  | "AffectedStructure"
  | "Trees"
  | "Crops"
  | "IncomeLoss"
  | "Others";

export type TableCategory = RosterCategory | "Generic";

export interface TableSignature {
  category: RosterCategory;
  /** Rows kept when the roster is repopulated. */
  headerRows: number;
  /** Matched as-is. */
  markers: readonly string[];
  /** Matched against the lower-cased text. */
  lowerMarkers?: readonly string[];
}

export const TABLE_SIGNATURES: readonly TableSignature[] = [
  {
    category: "RankedNeeds",
    headerRows: 2,
    markers: ["{bus_info_needs}", "What types of information would be helpful", "Information Needs"],
  },
  { category: "HouseholdMember", headerRows: 2, markers: ["Name of HH Member"] },
  { category: "Savings", headerRows: 1, markers: ["Ownership of at least one savings account"] },
  { category: "Labor", headerRows: 3, markers: ["Labor Force Status"] },
  { category: "Debt", headerRows: 1, markers: ["With formal loan contract? (Y/N)"] },
  {
    category: "Land",
    headerRows: 2,
    markers: ["13.1 Affected Assets: Land", "10.0 Affected Assets: Land"],
  },
  {
    category: "Structure",
    headerRows: 2,
    markers: ["13.2 Affected Assets: Structure", "10.2 Affected Assets: Structure"],
  },
  {
    category: "AffectedStructure",
    headerRows: 2,
    markers: ["13.3 Affected Structure", "10.3 Affected Structure"],
  },
  { category: "Trees", headerRows: 1, markers: ["13.4 Trees", "10.4 Trees"] },
  {
    category: "Crops",
    headerRows: 1,
    markers: ["13.5 Crops", "10.5 Crops"],
    lowerMarkers: ["crops_grp_converted"],
  },
  {
    category: "IncomeLoss",
    headerRows: 1,
    markers: ["13.6 Income Loss", "10.6 Income Loss"],
    lowerMarkers: ["income_loss_grp_converted"],
  },
  {
    category: "Others",
    headerRows: 1,
    markers: ["13.7 Others", "10.7 Others"],
    lowerMarkers: ["others_grp_converted"],
  },
];

const HEADER_ROWS = new Map<RosterCategory, number>(
  TABLE_SIGNATURES.map((s) => [s.category, s.headerRows]),
);

/** `leadingText` is the cell text of the first two rows joined by spaces. */
export function classifyTable(leadingText: string): TableCategory {
  const lower = leadingText.toLowerCase();
  for (const sig of TABLE_SIGNATURES) {
    if (sig.markers.some((m) => leadingText.includes(m))) return sig.category;
    if (sig.lowerMarkers?.some((m) => lower.includes(m))) return sig.category;
  }
  return "Generic";
}

export function headerRowCount(category: RosterCategory): number {
  return HEADER_ROWS.get(category) ?? 1;
}
