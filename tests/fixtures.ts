import type { CandidateProfileInput, ExperienceEntryInput } from '@tailorkit/schemas';

export const PROCESS_ENGINEER_JD = `Senior Process Engineer at Northwind Components.
Lead cross-functional teams through NPI and scale up of new product lines.
Drive cost savings across the supply chain and support the quality team on complaints.
Hands-on automation and robotics experience; CAPEX equipment design a plus.
Lean Six Sigma practice in regulated environments; value stream optimization.
Strong communication and presenting skills; growth mindset and collaboration.
8+ years of manufacturing experience. Bachelor's degree in Engineering required.
On-site role; travel up to 20%; relocation assistance available.`;

export const baseCandidate: CandidateProfileInput = {
  degree: 'Bachelor of Science in Mechanical Engineering',
  yearsExperience: 12,
  skills: ['Manufacturing', 'Supply Chain', 'Cost Savings', 'Quality', 'NPI', 'Scale Up'],
  technologies: ['Automation', 'Robotics'],
  methodologies: ['Lean', 'Six Sigma'],
  travelOk: true,
  relocationOk: true,
};

export const experience: ExperienceEntryInput[] = [
  {
    company: 'Northwind Components',
    title: 'Process Engineer',
    dates: '2019 - 2024',
    bullets: [
      'Led lean rollout that reduced scrap by 18%',
      'Assisted with quality audits',
      'Managed automation cell commissioning for quality line',
    ],
  },
  {
    company: 'Harbor Plastics',
    title: 'Quality Technician',
    dates: '2012 - 2015',
    bullets: ['Documented quality procedures'],
  },
  {
    company: 'Corner Cafe',
    title: 'Barista',
    dates: '2010 - 2011',
    bullets: ['Served customers'],
  },
];
