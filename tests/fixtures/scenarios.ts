import { makeSource } from './sources';

/** Same senior PM opening on the careers site (with salary) and on LinkedIn (without). */
export const seniorPm = {
  primary: makeSource({
    sourceId: 'gh-pm',
    url: 'https://boards.greenhouse.io/acme/jobs/1',
    salaryText: '$150k–180k',
  }),
  secondary: makeSource({
    sourceId: 'li-pm',
    platform: 'linkedin',
    sourceType: 'secondary',
    url: 'https://www.linkedin.com/jobs/view/1',
  }),
};

/** A current data engineer posting and a 200-day-old board copy of an earlier version. */
export const staleDataEngineer = {
  primary: makeSource({
    sourceId: 'gh-de',
    requisitionId: 'REQ-7',
    title: 'Data Engineer',
    locationText: 'Austin, TX',
    salaryText: '$150k - $180k',
    descriptionText:
      'Build streaming pipelines with Kafka and Flink for real-time fraud detection across payments.',
  }),
  secondary: makeSource({
    sourceId: 'ind-de',
    platform: 'indeed',
    sourceType: 'secondary',
    requisitionId: 'req-7',
    title: 'Data Engineer',
    locationText: 'Denver, CO',
    salaryText: '$120k - $140k',
    descriptionText: 'Maintain nightly batch reports in a legacy Oracle warehouse using PL/SQL scripts.',
    postedDate: new Date('2023-08-14T00:00:00Z'),
  }),
};

/** The same opening on two boards, never on a first-party site. */
export const boardsOnly = [
  makeSource({ sourceId: 'li-ops', platform: 'linkedin', sourceType: 'secondary' }),
  makeSource({ sourceId: 'zr-ops', platform: 'ziprecruiter', sourceType: 'secondary' }),
];
