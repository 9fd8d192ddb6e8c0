import type { Analyzer } from '../types.js';
import { emit, plural } from '../utils/helpers.js';
import { containsAny } from '../utils/matcher.js';

const WORKFLOW_GLOBS = ['.github/workflows/*.yml', '.github/workflows/*.yaml'];

const TRIGGERS = ['pull_request', 'push', 'workflow_dispatch'];

const TEST_RUNNERS = [
  'pytest',
  'npm test',
  'npm run test',
  'yarn test',
  'pnpm test',
  'go test',
  'dotnet test',
  'mvn test',
  'gradle test',
  'cargo test',
  'unittest',
  'jest',
  'vitest',
];

const BUILD_STEPS = ['docker build', 'buildx', 'build and push', 'publish', 'package'];

const SECURITY_SCANNERS = ['codeql', 'trivy', 'snyk', 'bandit', 'gitleaks', 'dependency-review-action'];

// Registry hosts and login actions; bare "ecr"/"acr" would also hit words like "secrets"
const REGISTRY_STEPS = [
  'docker/login-action',
  'docker/build-push-action',
  'docker push',
  'buildx',
  'amazon-ecr-login',
  '.dkr.ecr.',
  'gcr.io',
  'ghcr.io',
  'azurecr.io',
  'azure/docker-login',
  'acr login',
];

const DEPLOY_STEPS = [
  'kubectl apply',
  'kubectl rollout',
  'helm upgrade',
  'helm install',
  'terraform apply',
  'pulumi up',
  'ecs deploy',
  'azure/webapps-deploy',
  'gcloud run deploy',
];

export const cicdAnalyzer: Analyzer = {
  id: 'cicd',
  category: 'CI/CD',
  title: 'CI/CD Pipeline',

  async run({ evidence }) {
    const workflows = evidence.filesMatching(WORKFLOW_GLOBS);
    const combined = await evidence.textOf(workflows);

    return emit('CI/CD', [
      {
        name: 'GitHub Actions workflows exist',
        pass: workflows.length > 0,
        sev: 'critical',
        msgPass: `Found ${plural(workflows.length, 'workflow file')}.`,
        msgFail: 'No workflow files in .github/workflows.',
      },
      {
        name: 'Pipeline has triggers',
        pass: containsAny(combined, TRIGGERS),
        sev: 'critical',
        msgPass: 'Found common triggers.',
        msgFail: 'No common CI triggers found.',
      },
      {
        name: 'Pipeline checks out code',
        pass: containsAny(combined, ['actions/checkout']),
        sev: 'warning',
        msgPass: 'actions/checkout found.',
        msgFail: 'No checkout step found.',
      },
      {
        name: 'Pipeline runs tests',
        pass: containsAny(combined, TEST_RUNNERS),
        sev: 'critical',
        msgPass: 'Test command detected.',
        msgFail: 'No obvious test step detected.',
      },
      {
        name: 'Pipeline has build/package step',
        pass: containsAny(combined, BUILD_STEPS),
        sev: 'warning',
        msgPass: 'Build/package keywords found.',
        msgFail: 'No clear build/package step detected.',
      },
      {
        name: 'Pipeline has security scanning',
        pass: containsAny(combined, SECURITY_SCANNERS),
        sev: 'info',
        msgPass: 'Security scan keyword found.',
        msgFail: 'No security scan detected.',
      },
      {
        name: 'Pipeline pushes image to registry',
        pass: containsAny(combined, REGISTRY_STEPS),
        sev: 'critical',
        msgPass: 'Registry push/login step detected.',
        msgFail: 'No registry push/login detected.',
      },
      {
        name: 'Pipeline deploys application',
        pass: containsAny(combined, DEPLOY_STEPS),
        sev: 'critical',
        msgPass: 'Deploy step detected.',
        msgFail: 'No deploy step detected.',
      },
    ]);
  },
};
