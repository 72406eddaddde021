import type { Task } from '@taskplanner/shared';
import { synthesizeMilestones } from './milestones';

const start = new Date(2025, 2, 1);

function makeTasks(count: number): Task[] {
  return Array.from({ length: count }, (_, i): Task => ({
    id: i + 1,
    title: `Task ${i + 1}`,
    description: '',
    estimated_hours: 4,
    dependencies: i > 0 ? [i] : [],
    deadline: '2025-03-02',
    priority: 'High',
    category: 'Planning',
  }));
}

describe('synthesizeMilestones', () => {
  it('emits four milestones for more than three tasks', () => {
    const milestones = synthesizeMilestones(makeTasks(8), start, new Date(2025, 2, 22), 21);

    expect(milestones).toEqual([
      { name: 'Project Kickoff & Planning Complete', date: '2025-03-01', tasks_completed: [] },
      { name: 'Initial Phase Complete', date: '2025-03-08', tasks_completed: [1, 2] },
      { name: 'Development Phase Complete', date: '2025-03-15', tasks_completed: [1, 2, 3, 4, 5] },
      {
        name: 'Project Completion & Delivery',
        date: '2025-03-22',
        tasks_completed: [1, 2, 3, 4, 5, 6, 7, 8],
      },
    ]);
  });

  it('emits only kickoff and completion for three tasks or fewer', () => {
    const milestones = synthesizeMilestones(makeTasks(3), start, new Date(2025, 2, 15), 14);

    expect(milestones.map((m) => m.name)).toEqual([
      'Project Kickoff & Planning Complete',
      'Project Completion & Delivery',
    ]);
    expect(milestones[1]?.tasks_completed).toEqual([1, 2, 3]);
  });

  it('takes intermediate task sets by position', () => {
    const tasks = makeTasks(4).map((task) => ({ ...task, id: task.id * 10 }));
    const milestones = synthesizeMilestones(tasks, start, new Date(2025, 2, 15), 14);

    expect(milestones[1]).toEqual({
      name: 'Initial Phase Complete',
      date: '2025-03-05',
      tasks_completed: [10],
    });
    expect(milestones[2]).toEqual({
      name: 'Development Phase Complete',
      date: '2025-03-10',
      tasks_completed: [10, 20],
    });
  });
});
