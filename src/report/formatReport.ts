import { CircleInfo, JourneySummary } from '../types';

const BULLET = '  •';

export const RULE = '='.repeat(50);

function line(label: string, value: string | number | null): string {
  return `${BULLET} ${label}: ${value ?? '-'}`;
}

/**
 * Human-readable lines for a journey summary
 */
export function formatJourneySummary(summary: JourneySummary): string[] {
  return [
    line('User', summary.handle),
    line('Category', summary.category),
    line('Level', summary.level),
    line('Insights', summary.insightCount),
    line('Practices', summary.practiceCount),
    line('Registered', summary.registeredAt),
  ];
}

/**
 * Human-readable lines for a circle. Description and owner id are left out.
 */
export function formatCircleInfo(info: CircleInfo): string[] {
  return [
    line('Id', info.id),
    line('Name', info.name),
    line('Category', info.category),
    line('Collective intention', info.collectiveIntention),
    line('Created', info.createdAt),
    line('Members', info.memberCount),
    line('Average level', info.averageLevel),
  ];
}

/**
 * Title framed by horizontal rules
 */
export function banner(title: string): string[] {
  return [RULE, title, RULE];
}
