import type { WorkflowService } from './service';

/** Loads a couple of definitions and one running instance for the demo user. */
export const seedDemoData = async (service: WorkflowService, userId: string): Promise<void> => {
  const onboarding = await service.createDefinition({
    name: 'Employee Onboarding',
    description: 'Steps for bringing a new team member on board',
    taskDefinitions: [
      { name: 'Prepare laptop', order: 1, dueDatetimeOffsetMinutes: 0 },
      { name: 'Create accounts', order: 2, dueDatetimeOffsetMinutes: 60 },
      { name: 'Schedule intro meetings', order: 3, dueDatetimeOffsetMinutes: 1440 }
    ]
  });

  await service.createDefinition({
    name: 'Release Checklist',
    description: 'Things to verify before tagging a release',
    taskDefinitions: [
      { name: 'Run the test suite', order: 1, dueDatetimeOffsetMinutes: 0 },
      { name: 'Update the changelog', order: 2, dueDatetimeOffsetMinutes: 0 },
      { name: 'Tag and publish', order: 3, dueDatetimeOffsetMinutes: null }
    ]
  });

  await service.createInstance(onboarding.id, userId, { name: 'Onboarding: Sam' });
};
