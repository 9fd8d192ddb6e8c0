import type { Analyzer } from '../types.js';
import { emit } from '../utils/helpers.js';
import { containsAny } from '../utils/matcher.js';

const FAMILIES = [
  { label: 'Terraform', globs: ['*.tf'] },
  { label: 'Bicep', globs: ['*.bicep'] },
  { label: 'CloudFormation-like templates', globs: ['template.yaml', 'template.yml'] },
];

const COMPUTE = ['ecs', 'eks', 'container', 'app_service', 'cloud run', 'kubernetes'];
const NETWORK = ['vpc', 'subnet', 'security_group', 'network', 'route'];
const DATABASE = ['postgres', 'rds', 'sql', 'db_instance', 'database'];

export const iacAnalyzer: Analyzer = {
  id: 'iac',
  category: 'IaC',
  title: 'Infrastructure as Code',

  async run({ evidence }) {
    const found = FAMILIES.map((f) => ({ label: f.label, files: evidence.filesMatching(f.globs) }));
    const summary = found
      .filter((f) => f.files.length > 0)
      .map((f) => `${f.label}: ${f.files.length} file(s)`);
    const iacText = await evidence.textOf(found.flatMap((f) => f.files));

    return emit('IaC', [
      {
        name: 'Infrastructure as Code present',
        pass: summary.length > 0,
        sev: 'warning',
        msgPass: summary.join('; '),
        msgFail: 'No IaC files detected.',
      },
      {
        name: 'IaC defines compute resources',
        pass: containsAny(iacText, COMPUTE),
        sev: 'warning',
        msgPass: 'Compute keywords detected.',
        msgFail: 'No obvious compute resources detected.',
      },
      {
        name: 'IaC defines networking resources',
        pass: containsAny(iacText, NETWORK),
        sev: 'warning',
        msgPass: 'Networking keywords detected.',
        msgFail: 'No obvious networking resources detected.',
      },
      {
        name: 'IaC defines database resources',
        pass: containsAny(iacText, DATABASE),
        sev: 'warning',
        msgPass: 'Database keywords detected.',
        msgFail: 'No obvious database resources detected.',
      },
    ]);
  },
};
