/**
 * Minimal API smoke test script
 * Run with: npm run smoke (requires the API server running, default port 8787)
 */

const API_BASE = process.env.API_BASE ?? 'http://localhost:8787';

interface TestResult {
  name: string;
  passed: boolean;
  error?: string;
}

interface ChatResponse {
  reply: string;
  state: string | null;
}

const results: TestResult[] = [];

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
    results.push({ name, passed: true });
    console.log(`✓ ${name}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    results.push({ name, passed: false, error: message });
    console.log(`✗ ${name}: ${message}`);
  }
}

async function fetchJson(url: string, options?: RequestInit): Promise<unknown> {
  const response = await fetch(url, {
    ...options,
    headers: {
      'Content-Type': 'application/json',
      ...options?.headers,
    },
  });
  return response.json();
}

function isChatResponse(value: unknown): value is ChatResponse {
  return typeof value === 'object' && value !== null && 'reply' in value && 'state' in value;
}

async function chat(userId: string, text: string): Promise<ChatResponse> {
  const result = await fetchJson(`${API_BASE}/chat`, {
    method: 'POST',
    body: JSON.stringify({ user_id: userId, text }),
  });
  if (!isChatResponse(result)) throw new Error('Expected { reply, state }');
  return result;
}

async function runTests(): Promise<void> {
  console.log('\n=== API Smoke Tests ===\n');
  const userId = `smoke-${Date.now()}`;

  await test('GET /health returns ok:true', async () => {
    const result = await fetchJson(`${API_BASE}/health`);
    if (typeof result !== 'object' || result === null || !('ok' in result) || result.ok !== true) {
      throw new Error('Expected ok:true');
    }
  });

  await test('POST /chat rejects a body without text', async () => {
    const response = await fetch(`${API_BASE}/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ user_id: userId }),
    });
    if (response.status !== 400) throw new Error(`Expected 400, got ${response.status}`);
  });

  await test('first message starts onboarding', async () => {
    const { state } = await chat(userId, 'hi');
    if (state !== 'AWAITING_BALANCE') throw new Error(`Expected AWAITING_BALANCE, got ${state}`);
  });

  await test('balance moves on to budgets', async () => {
    const { state } = await chat(userId, '1500');
    if (state !== 'AWAITING_BUDGETS' && state !== 'ACTIVE') {
      throw new Error(`Expected AWAITING_BUDGETS or ACTIVE, got ${state}`);
    }
  });

  await test('GET /budgets returns array', async () => {
    const result = await fetchJson(`${API_BASE}/budgets`);
    if (!Array.isArray(result)) throw new Error('Expected array');
  });

  await test('GET /summary rejects a malformed month', async () => {
    const response = await fetch(`${API_BASE}/summary?month=2024-13`);
    if (response.status !== 400) throw new Error(`Expected 400, got ${response.status}`);
  });

  await test('GET /summary returns totals', async () => {
    const result = await fetchJson(`${API_BASE}/summary?month=2024-01`);
    if (typeof result !== 'object' || result === null || !('total_spent' in result)) {
      throw new Error('Expected total_spent');
    }
  });

  // Summary
  console.log('\n=== Summary ===');
  const passed = results.filter(r => r.passed).length;
  const failed = results.filter(r => !r.passed).length;
  console.log(`Passed: ${passed}, Failed: ${failed}`);

  if (failed > 0) {
    process.exit(1);
  }
}

// Check if API is reachable before running tests
async function checkApiReachable(): Promise<boolean> {
  try {
    const response = await fetch(`${API_BASE}/health`);
    return response.ok;
  } catch (error) {
    console.error('Health check failed:', error instanceof Error ? error.message : error);
    return false;
  }
}

async function main(): Promise<void> {
  console.log('Checking if API server is running...');

  const reachable = await checkApiReachable();
  if (!reachable) {
    console.error(`\nError: API server not reachable at ${API_BASE}`);
    console.error('Please start the server with: npm run dev\n');
    process.exit(1);
  }

  await runTests();
}

main().catch((error: unknown) => {
  console.error('Smoke test crashed:', error);
  process.exit(1);
});
