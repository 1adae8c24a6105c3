// Lightweight structural checks for CycloneDX documents handed to extraction.
// Errors make the document unusable; warnings are reported but don't stop extraction.

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validateCycloneDXShape(doc: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];
  if (!isRecord(doc)) {
    errors.push('Document not an object');
    return { valid: false, errors, warnings };
  }
  if (doc.bomFormat === undefined) warnings.push('bomFormat missing');
  else if (doc.bomFormat !== 'CycloneDX') warnings.push(`bomFormat is ${String(doc.bomFormat)}, expected CycloneDX`);
  if (!doc.specVersion) warnings.push('specVersion missing');
  if (doc.components !== undefined && doc.components !== null) {
    if (!Array.isArray(doc.components)) errors.push('components must be array');
    else {
      let unusable = 0;
      doc.components.forEach((c: unknown) => { if (!isRecord(c)) unusable++; });
      if (unusable) warnings.push(`${unusable} component entries are not objects and were skipped`);
    }
  }
  return { valid: errors.length === 0, errors, warnings };
}
