import { addDays, formatIsoDate, type Milestone, type Task } from '@taskplanner/shared';

/**
 * Kickoff and completion milestones, plus two intermediate ones when the plan
 * has more than three tasks. Intermediate milestones take the first third and
 * first two-thirds of the tasks by position.
 */
export function synthesizeMilestones(
  tasks: Task[],
  startDate: Date,
  endDate: Date,
  totalDays: number,
): Milestone[] {
  const milestones: Milestone[] = [
    {
      name: 'Project Kickoff & Planning Complete',
      date: formatIsoDate(startDate),
      tasks_completed: [],
    },
  ];

  if (tasks.length > 3) {
    const thirdPoint = Math.floor(tasks.length / 3);
    const twoThirdPoint = Math.floor((tasks.length * 2) / 3);

    milestones.push({
      name: 'Initial Phase Complete',
      date: formatIsoDate(addDays(startDate, Math.floor(totalDays / 3))),
      tasks_completed: tasks.slice(0, thirdPoint).map((task) => task.id),
    });
    milestones.push({
      name: 'Development Phase Complete',
      date: formatIsoDate(addDays(startDate, Math.floor((totalDays * 2) / 3))),
      tasks_completed: tasks.slice(0, twoThirdPoint).map((task) => task.id),
    });
  }

  milestones.push({
    name: 'Project Completion & Delivery',
    date: formatIsoDate(endDate),
    tasks_completed: tasks.map((task) => task.id),
  });

  return milestones;
}
