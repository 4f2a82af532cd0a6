import type { Model } from '../model/model';
import { classNames } from '../model/model';
import type { MappingReport, ReportFinding } from './mappingReport';

export function addFinding(report: MappingReport, finding: ReportFinding): void {
  report.findings.push(finding);
}

/**
 * Fill counts and dangling-reference findings from a mapped model.
 * Unresolved names are legal in the model; the report only makes them visible.
 */
export function collectModelFindings(report: MappingReport, model: Model): void {
  const known = classNames(model);

  for (const cls of model.classes) {
    report.counts.classes++;
    report.counts.properties += cls.properties.length;
    report.counts.associations += cls.associations.length;

    for (const a of cls.associations) {
      if (known.has(a.target)) continue;
      addFinding(report, {
        kind: 'unresolvedAssociationTarget',
        severity: 'warning',
        message: `${cls.name} -> ${a.target}: no class named ${a.target}`,
        className: cls.name,
        tags: { target: a.target },
      });
    }

    if (cls.superclass === undefined) continue;
    report.counts.generalizations++;
    if (!known.has(cls.superclass)) {
      addFinding(report, {
        kind: 'unresolvedSuperclass',
        severity: 'warning',
        message: `${cls.name} : ${cls.superclass}: no class named ${cls.superclass}`,
        className: cls.name,
        tags: { superclass: cls.superclass },
      });
    }
  }
}
