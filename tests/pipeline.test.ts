import { describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../src/config.js';
import { CancelledError, TransportError, ValidationError } from '../src/errors.js';
import {
  AnalysisOrchestrator,
  createAnalysisRuntime,
  parseAnalysisRequest,
  runAnalysis,
  validateBundle,
} from '../src/pipeline.js';
import { ANALYSIS_INCOMPLETE_NARRATIVE, STRUCTURED_ANALYSIS_INCOMPLETE } from '../src/report.js';
import type { AnalysisBundle, Bug } from '../src/types.js';
import {
  API_BASE,
  AUTH_URL,
  COMPLETIONS_URL,
  FakeGateway,
  ZERO_BUG_PAYLOADS,
  functionCallCompletion,
  functionCallResponse,
  functionNameOf,
  jsonBodyOf,
  jsonResponse,
  noSleep,
  textRawResponse,
  urlOf,
  zeroBugResponder,
} from './helpers.js';

const bundle: AnalysisBundle = {
  requirements: 'Users must authenticate before accessing the dashboard.',
  code: "def login(user, pwd):\n    return user == 'admin' and pwd == 'placeholder'",
  tests: "assert login('admin', 'placeholder')",
  documentation: '',
  flags: { analyzeSecurity: true },
};

const ALL_FUNCTIONS = [
  'requirements_analysis',
  'code_analysis',
  'test_analysis',
  'documentation_analysis',
  'security_analysis',
  'bug_analysis',
  'report_synthesis',
];

const hardcodedCredentials: Bug = {
  description: 'Credentials are hardcoded',
  cause: 'Literal comparison in login',
  severity: 'critical',
  location: 'login',
  impact: 'Anyone reading the source can log in',
  remediation: 'Check against a credential store',
};

function orchestrate(gateway: FakeGateway) {
  return new AnalysisOrchestrator(gateway, { model: 'test-model' });
}

describe('AnalysisOrchestrator', () => {
  it('runs every stage in order with the stage function offered', async () => {
    const gateway = new FakeGateway(zeroBugResponder);

    await orchestrate(gateway).run(bundle);

    expect(gateway.functionNames()).toEqual(ALL_FUNCTIONS);
    for (const call of gateway.calls) {
      expect(call.mode).toBe('auto');
      expect(call.envelope.model).toBe('test-model');
      expect(call.envelope.messages.map((m) => m.role)).toEqual(['system', 'user']);
    }
  });

  it('reports zero bugs and the synthesised narrative for correct code', async () => {
    const report = await orchestrate(new FakeGateway(zeroBugResponder)).run(bundle);

    expect(report.status).toBe('complete');
    expect(report.bug_count).toBe(0);
    expect(report.bugs).toEqual([]);
    expect(report.bugs_explanation).toBe('The code satisfies the requirement.');
    expect(report.final_report).toBe('The login function meets the stated authentication requirement.');
    expect(report.recommendations).toEqual([
      { text: 'Add a rejected-login test', priority: 'high', category: 'Quality', source: 'report' },
    ]);
    expect(report.security_findings).toEqual([]);
    expect(report.diagnostics.warnings).toEqual([]);
    expect(report.diagnostics.stages.map((s) => [s.stage, s.status, s.path, s.attempts])).toEqual([
      ['requirements', 'succeeded', 'structured', 1],
      ['code', 'succeeded', 'structured', 1],
      ['tests', 'succeeded', 'structured', 1],
      ['documentation', 'succeeded', 'structured', 1],
      ['security', 'succeeded', 'structured', 1],
      ['bugs', 'succeeded', 'structured', 1],
      ['report', 'succeeded', 'structured', 1],
    ]);
  });

  it('skips the security stage when it is disabled', async () => {
    const gateway = new FakeGateway(zeroBugResponder);

    const report = await orchestrate(gateway).run({ ...bundle, flags: { analyzeSecurity: false } });

    expect(gateway.functionNames()).toEqual(ALL_FUNCTIONS.filter((name) => name !== 'security_analysis'));
    expect(report).not.toHaveProperty('security_findings');
    expect(report.diagnostics.stages).toHaveLength(6);
  });

  it('records a stage whose transport failed and keeps going', async () => {
    const failure = 'Request to chat/completions failed after 5 attempts: Network error: fetch failed';
    const gateway = new FakeGateway((name) => {
      if (name === 'code_analysis') throw new TransportError(failure, 5);
      return zeroBugResponder(name);
    });

    const report = await orchestrate(gateway).run(bundle);

    expect(gateway.functionNames()).toEqual(ALL_FUNCTIONS);
    expect(report.status).toBe('partial');
    expect(report.diagnostics.stages[1]).toMatchObject({
      stage: 'code',
      status: 'failed',
      path: 'failure',
      attempts: 5,
      error: failure,
      error_code: 'E2002',
    });
    expect(report.bug_count).toBe(0);
    expect(gateway.userMessageFor('bug_analysis')).toContain(`## Code analysis\n(unavailable: ${failure})`);
  });

  it('passes a free-text answer downstream and marks the stage degraded', async () => {
    const gateway = new FakeGateway((name) =>
      name === 'test_analysis' ? textRawResponse('Only the happy path is tested.') : zeroBugResponder(name),
    );

    const report = await orchestrate(gateway).run(bundle);

    expect(report.status).toBe('partial');
    expect(report.diagnostics.stages[2]).toMatchObject({ stage: 'tests', status: 'degraded', path: 'text' });
    expect(gateway.userMessageFor('bug_analysis')).toContain('## Test analysis\nOnly the happy path is tested.');
  });

  it('returns the incomplete narrative when every stage fails', async () => {
    const gateway = new FakeGateway(() => {
      throw new Error('gateway down');
    });

    const report = await orchestrate(gateway).run(bundle);

    expect(report.status).toBe('failed');
    expect(report.final_report).toBe(ANALYSIS_INCOMPLETE_NARRATIVE);
    expect(report.bug_count).toBe(0);
    expect(report.bugs).toEqual([]);
    expect(report.diagnostics.stages).toHaveLength(7);
    for (const stage of report.diagnostics.stages) {
      expect(stage).toMatchObject({ status: 'failed', error: 'gateway down', attempts: 1 });
      expect(stage).not.toHaveProperty('error_code');
    }
  });

  it('marks the report incomplete when every stage answers in prose', async () => {
    const gateway = new FakeGateway((name) => textRawResponse(`Prose answer for ${name}.`));

    const report = await orchestrate(gateway).run(bundle);

    expect(report.status).toBe('partial');
    expect(report.final_report).toBe(`${STRUCTURED_ANALYSIS_INCOMPLETE}\n\nProse answer for report_synthesis.`);
    expect(report.bug_count).toBe(0);
    expect(report.bugs_explanation).toBe('Prose answer for bug_analysis.');
    expect(report.diagnostics.warnings).toEqual([
      'Bug synthesis unavailable; bugs were collected from the individual analyses',
      'No stage returned structured output; the report is built from free text only',
    ]);
  });

  it('collects bugs from the individual analyses when bug synthesis is unavailable', async () => {
    const gateway = new FakeGateway((name) => {
      if (name === 'code_analysis') {
        return functionCallResponse(name, { summary: 'Hardcoded credentials', bugs: [hardcodedCredentials] });
      }
      if (name === 'bug_analysis') return textRawResponse('There is one serious problem.');
      return zeroBugResponder(name);
    });

    const report = await orchestrate(gateway).run(bundle);

    expect(report.bug_count).toBe(1);
    expect(report.bugs).toEqual([hardcodedCredentials]);
    expect(report.diagnostics.warnings).toEqual([
      'Bug synthesis unavailable; bugs were collected from the individual analyses',
    ]);
  });

  it('counts the listed bugs when the synthesised count disagrees', async () => {
    const gateway = new FakeGateway((name) =>
      name === 'bug_analysis'
        ? functionCallResponse(name, { bug_count: 3, bugs: [hardcodedCredentials] })
        : zeroBugResponder(name),
    );

    const report = await orchestrate(gateway).run(bundle);

    expect(report.bug_count).toBe(1);
    expect(report.bugs).toEqual([hardcodedCredentials]);
    expect(report.diagnostics.warnings).toEqual([
      'Bug synthesis reported bug_count=3 but listed 1; the listed bugs are used',
    ]);
  });

  it('uses a free-text report as the narrative and merges stage recommendations', async () => {
    const gateway = new FakeGateway((name) =>
      name === 'report_synthesis' ? textRawResponse('Overall the code is acceptable.') : zeroBugResponder(name),
    );

    const report = await orchestrate(gateway).run(bundle);

    expect(report.final_report).toBe('Overall the code is acceptable.');
    expect(report.recommendations).toEqual([
      { text: 'State the lockout policy', source: 'requirements' },
      { text: 'Move credentials out of the source', source: 'code' },
      { text: 'Add a rejected-login test', source: 'tests' },
    ]);
  });

  it('composes a narrative from the stage summaries when report synthesis fails', async () => {
    const gateway = new FakeGateway((name) =>
      name === 'report_synthesis' ? { choices: [] } : zeroBugResponder(name),
    );

    const report = await orchestrate(gateway).run(bundle);

    expect(report.status).toBe('partial');
    expect(report.final_report).toBe(
      [
        'The final report could not be synthesised; the individual analyses are summarised below.',
        '',
        '- Requirements analysis: A single requirement: authentication is required.',
        '- Code analysis: login compares the supplied credentials against fixed values.',
        '- Test analysis: One positive test case.',
        '- Documentation analysis: No documentation was provided.',
        '- Security analysis: structured result available',
        '- Bug synthesis: The code satisfies the requirement.',
        '',
        'Bugs identified: 0.',
      ].join('\n'),
    );
    expect(report.diagnostics.stages[6]).toMatchObject({ stage: 'report', status: 'failed', error: 'empty response' });
  });

  it('rejects a bundle with nothing to analyse without calling the gateway', async () => {
    const gateway = new FakeGateway(zeroBugResponder);
    const empty: AnalysisBundle = { requirements: ' ', code: '', tests: '', documentation: '', flags: { analyzeSecurity: true } };

    await expect(orchestrate(gateway).run(empty)).rejects.toBeInstanceOf(ValidationError);
    expect(gateway.calls).toHaveLength(0);
  });

  it('stops before the next stage once cancelled', async () => {
    const controller = new AbortController();
    const gateway = new FakeGateway((name) => {
      if (name === 'code_analysis') controller.abort();
      return zeroBugResponder(name);
    });

    await expect(orchestrate(gateway).run(bundle, { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(gateway.functionNames()).toEqual(['requirements_analysis', 'code_analysis']);
  });

  it('propagates cancellation raised inside a stage', async () => {
    const gateway = new FakeGateway((name) => {
      if (name === 'test_analysis') throw new CancelledError();
      return zeroBugResponder(name);
    });

    await expect(orchestrate(gateway).run(bundle)).rejects.toBeInstanceOf(CancelledError);
    expect(gateway.calls).toHaveLength(3);
  });
});

describe('validateBundle', () => {
  it('rejects a field of the wrong type', () => {
    const input = { requirements: 'r', code: 42, tests: '', documentation: '', flags: { analyzeSecurity: true } };

    expect(() => validateBundle(input)).toThrow('Malformed analysis bundle: code: Expected string, received number');
  });

  it('returns a frozen copy', () => {
    const validated = validateBundle(bundle);

    expect(validated).toEqual(bundle);
    expect(Object.isFrozen(validated)).toBe(true);
    expect(Object.isFrozen(validated.flags)).toBe(true);
  });
});

describe('parseAnalysisRequest', () => {
  it('maps the request fields onto a bundle', () => {
    expect(parseAnalysisRequest({ requirements: 'r', code: 'c', test_cases: 't' })).toEqual({
      requirements: 'r',
      code: 'c',
      tests: 't',
      documentation: '',
      flags: { analyzeSecurity: true },
    });
  });

  it('uses the configured default unless the request sets the flag', () => {
    const off = { analyzeSecurity: false };

    expect(parseAnalysisRequest({ requirements: 'r', code: 'c', test_cases: '' }, off).flags.analyzeSecurity).toBe(
      false,
    );
    expect(
      parseAnalysisRequest({ requirements: 'r', code: 'c', test_cases: '', analyze_security: true }, off).flags
        .analyzeSecurity,
    ).toBe(true);
  });

  it('rejects a request without code', () => {
    expect(() => parseAnalysisRequest({ requirements: 'r', test_cases: 't' })).toThrow(
      'Malformed analysis request: code: Required',
    );
  });
});

describe('runAnalysis', () => {
  const config = loadConfig({
    LLM_GATEWAY_API_KEY: 'test-secret',
    LLM_GATEWAY_API_BASE: API_BASE,
    LLM_GATEWAY_AUTH_URL: AUTH_URL,
    LLM_GATEWAY_MODEL: 'test-model',
  });

  function gatewayFetch(failing?: string) {
    return vi.fn<typeof fetch>(async (input, init) => {
      if (urlOf(input) === AUTH_URL) {
        return jsonResponse({ access_token: 'tok-1', expires_at: Date.now() + 3_600_000 });
      }
      const name = functionNameOf(init) ?? '';
      if (name === failing) throw new TypeError('fetch failed');
      return jsonResponse(functionCallCompletion(name, ZERO_BUG_PAYLOADS[name]));
    });
  }

  it('analyses a bundle end to end over one credential exchange', async () => {
    const fetchFn = gatewayFetch();
    const runtime = createAnalysisRuntime(config, { fetchFn, sleepFn: noSleep });

    const report = await runAnalysis(bundle, runtime);

    expect(report.status).toBe('complete');
    expect(report.bug_count).toBe(0);
    expect(fetchFn.mock.calls.filter(([input]) => urlOf(input) === AUTH_URL)).toHaveLength(1);
    const completions = fetchFn.mock.calls.filter(([input]) => urlOf(input) === COMPLETIONS_URL);
    expect(completions.map(([, init]) => functionNameOf(init))).toEqual(ALL_FUNCTIONS);
    expect(jsonBodyOf(completions[0][1])).toMatchObject({ model: 'test-model', temperature: 0.7, max_tokens: 4096 });
  });

  it('records a stage whose requests keep failing after the retry budget', async () => {
    const fetchFn = gatewayFetch('code_analysis');
    const runtime = createAnalysisRuntime(config, { fetchFn, sleepFn: noSleep });

    const report = await runAnalysis(bundle, runtime);

    const codeCalls = fetchFn.mock.calls.filter(
      ([input, init]) => urlOf(input) === COMPLETIONS_URL && functionNameOf(init) === 'code_analysis',
    );
    expect(codeCalls).toHaveLength(5);
    expect(report.status).toBe('partial');
    expect(report.bug_count).toBe(0);
    expect(report.diagnostics.stages[1]).toMatchObject({
      stage: 'code',
      status: 'failed',
      attempts: 5,
      error_code: 'E2002',
      error: 'Request to chat/completions failed after 5 attempts: Network error: fetch failed',
    });
  });
});
