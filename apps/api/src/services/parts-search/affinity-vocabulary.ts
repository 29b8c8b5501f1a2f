/**
 * Affinity vocabularies
 *
 * Tagged lookup tables mapping trigger substrings (matched against the
 * lowercased query) to canonical labels. Order matters: for categories the
 * first trigger found in a query wins.
 */

export interface AffinityTrigger {
  trigger: string
  label: string
}

export const CATEGORY_TRIGGERS: readonly AffinityTrigger[] = [
  { trigger: 'resistor', label: 'Resistors' },
  { trigger: 'capacitor', label: 'Capacitors' },
  { trigger: 'transistor', label: 'Transistors' },
  { trigger: 'ic', label: 'Integrated Circuits' },
  { trigger: 'integrated circuit', label: 'Integrated Circuits' },
]

// Labels are the title-cased trigger
export const MANUFACTURER_TRIGGERS: readonly AffinityTrigger[] = [
  { trigger: 'ti', label: 'Ti' },
  { trigger: 'texas instruments', label: 'Texas Instruments' },
  { trigger: 'analog devices', label: 'Analog Devices' },
  { trigger: 'maxim', label: 'Maxim' },
  { trigger: 'linear', label: 'Linear' },
  { trigger: 'stmicroelectronics', label: 'Stmicroelectronics' },
  { trigger: 'infineon', label: 'Infineon' },
  { trigger: 'nxp', label: 'Nxp' },
]

/**
 * Label of the first trigger contained in the query, if any
 */
export function firstMatchingLabel(
  query: string,
  table: readonly AffinityTrigger[]
): string | undefined {
  const lowerQuery = query.toLowerCase()
  return table.find(({ trigger }) => lowerQuery.includes(trigger))?.label
}

/**
 * Labels of every trigger contained in the query, in table order
 */
export function allMatchingLabels(query: string, table: readonly AffinityTrigger[]): string[] {
  const lowerQuery = query.toLowerCase()
  return table.filter(({ trigger }) => lowerQuery.includes(trigger)).map(({ label }) => label)
}
