import type { Plan } from '@taskplanner/shared';
import { OutputRenderer } from './renderer';

const plan: Plan = {
  goal: 'Host a book club',
  estimated_duration: '7 days',
  tasks: [
    {
      id: 1,
      title: 'Pick a book',
      description: 'Choose the first title',
      estimated_hours: 2,
      dependencies: [],
      deadline: '2025-03-02',
      priority: 'High',
      category: 'Planning',
    },
    {
      id: 2,
      title: 'Send invitations',
      description: 'Invite members',
      estimated_hours: 1,
      dependencies: [1],
      deadline: '2025-03-08',
      priority: 'Medium',
      category: 'Communications',
    },
  ],
  timeline: {
    start_date: '2025-03-01',
    end_date: '2025-03-08',
    milestones: [
      { name: 'Project Kickoff & Planning Complete', date: '2025-03-01', tasks_completed: [] },
      { name: 'Project Completion & Delivery', date: '2025-03-08', tasks_completed: [1, 2] },
    ],
  },
};

describe('OutputRenderer', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const output = () => logSpy.mock.calls.map((c) => String(c[0])).join('\n');

  it('renders JSON output when json mode is enabled', () => {
    const renderer = new OutputRenderer(true);
    renderer.renderPlan({ id: 3, plan, llm_method: 'fallback' });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(logSpy.mock.calls[0]?.[0]))).toEqual({
      id: 3,
      plan,
      llm_method: 'fallback',
    });
  });

  it('renders a stored plan for humans', () => {
    const renderer = new OutputRenderer(false);
    renderer.renderPlan({ id: 3, plan, llm_method: 'ollama' });

    const text = output();
    expect(text).toContain('Plan #3 created.');
    expect(text).toContain('Host a book club');
    expect(text).toContain('7 days (2025-03-01 → 2025-03-08)');
    expect(text).toContain('ollama');
    expect(text).toContain('Send invitations');
    expect(text).toContain('2025-03-08  Project Completion & Delivery');
    expect(text).toContain('(2 tasks)');
    expect(text).toContain('taskplanner show 3');
  });

  it('omits next steps for unsaved plans', () => {
    const renderer = new OutputRenderer(false);
    renderer.renderPlan({ plan, llm_method: 'fallback' });

    const text = output();
    expect(text).toContain('Plan generated (not saved).');
    expect(text).not.toContain('taskplanner show');
  });

  it('renders a stored record', () => {
    new OutputRenderer(false).renderRecord({
      id: 9,
      goal: plan.goal,
      plan,
      llm_method: 'fallback',
      created_at: '2025-03-01 10:00:00',
    });

    const text = output();
    expect(text).toContain('Plan #9');
    expect(text).toContain('created 2025-03-01 10:00:00');
    expect(text).toContain('Pick a book');
  });

  it('suppresses log lines in JSON mode', () => {
    new OutputRenderer(true).log('hidden');
    new OutputRenderer(false).log('shown');

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(output()).toContain('shown');
  });
});
