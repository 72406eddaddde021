import { formatIsoDate } from '@taskplanner/shared';

/**
 * Prompt asking the model for a plan in the wire format, dated from `today`.
 */
export function buildPlanPrompt(goal: string, today: Date): string {
  return `You are a professional project manager. Break down this goal into actionable tasks with realistic timelines and dependencies.

Goal: "${goal}"

Please respond with a JSON object in this exact format:
{
    "goal": "${goal}",
    "estimated_duration": "X days/weeks",
    "tasks": [
        {
            "id": 1,
            "title": "Task name",
            "description": "Detailed description",
            "estimated_hours": X,
            "dependencies": [],
            "deadline": "YYYY-MM-DD",
            "priority": "High/Medium/Low",
            "category": "Planning/Development/Testing/Marketing/etc"
        }
    ],
    "timeline": {
        "start_date": "YYYY-MM-DD",
        "end_date": "YYYY-MM-DD",
        "milestones": [
            {
                "name": "Milestone name",
                "date": "YYYY-MM-DD",
                "tasks_completed": [1, 2, 3]
            }
        ]
    }
}

Make tasks specific, actionable, and properly sequenced. Use today's date as reference: ${formatIsoDate(today)}`;
}
