/** One button on the keypad */
export interface KeyDefinition {
  readonly label: string;
  /** Columns occupied (default 1) */
  readonly span?: number;
  readonly style: "digit" | "operator" | "control" | "equals" | "scientific";
}

export const KEYPAD_COLUMNS = 4;

/** Rows shown only in scientific mode, above the standard keypad */
export const SCIENTIFIC_ROWS: readonly (readonly KeyDefinition[])[] = [
  [
    { label: "sin", style: "scientific" },
    { label: "cos", style: "scientific" },
    { label: "tan", style: "scientific" },
    { label: "√", style: "scientific" },
  ],
  [
    { label: "ln", style: "scientific" },
    { label: "log", style: "scientific" },
    { label: "exp", style: "scientific" },
    { label: "x^y", style: "scientific" },
  ],
];

export const STANDARD_ROWS: readonly (readonly KeyDefinition[])[] = [
  [
    { label: "1/x", style: "operator" },
    { label: "%", style: "operator" },
    { label: "CE", style: "control" },
    { label: "C", style: "control" },
  ],
  [
    { label: "7", style: "digit" },
    { label: "8", style: "digit" },
    { label: "9", style: "digit" },
    { label: "÷", style: "operator" },
  ],
  [
    { label: "4", style: "digit" },
    { label: "5", style: "digit" },
    { label: "6", style: "digit" },
    { label: "×", style: "operator" },
  ],
  [
    { label: "1", style: "digit" },
    { label: "2", style: "digit" },
    { label: "3", style: "digit" },
    { label: "−", style: "operator" },
  ],
  [
    { label: "±", style: "operator" },
    { label: "0", style: "digit" },
    { label: ".", style: "digit" },
    { label: "+", style: "operator" },
  ],
  [{ label: "=", style: "equals", span: 4 }],
];

export const KEY_COLORS: Readonly<Record<KeyDefinition["style"], number>> = {
  digit: 0x2a2a4a,
  operator: 0x3a3a6a,
  control: 0x5a2a3a,
  equals: 0xe94560,
  scientific: 0x24344d,
};
