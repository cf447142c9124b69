import { paragraphText, type DocumentTree } from '../resume/document-tree.js';

/** One line per block: `style[+rule]: text`, or a spacer marker. */
export function summarize(tree: DocumentTree): string[] {
  return tree.blocks.map((block) => {
    if (block.kind === 'spacer') {
      return block.variant === 'compact' ? '(compact spacer)' : '(spacer)';
    }
    return `${block.style}${block.bottomBorder ? '+rule' : ''}: ${paragraphText(block)}`;
  });
}

/** One job, every optional section empty. */
export function scenarioInput(): Record<string, unknown> {
  return {
    personal_info: { name: 'A B', email: 'a@b.com' },
    experience: [
      {
        company: 'X',
        location: 'Y',
        dates: 'Jan 2020 - Present',
        title: 'Eng',
        bullet_points: ['Did thing'],
      },
    ],
    education: [],
    skills: { categories: [] },
    certifications: [],
    extracurriculars: [],
    projects: [],
  };
}

export function fullInput(): Record<string, unknown> {
  return {
    personal_info: {
      name: 'Jane Doe',
      phone: '555-0100',
      email: 'jane@example.com',
      location: 'Springfield',
      linkedin: 'linkedin.com/in/jane-doe',
      github: 'github.com/jane-doe',
      visa_status: 'Authorized to work',
    },
    experience: [
      {
        company: 'Acme Corp',
        location: 'Springfield',
        dates: 'Jan 2021 - Present',
        title: 'Senior Engineer',
        bullet_points: ['Built the billing service', 'Cut deploy time in half'],
      },
      {
        company: 'Initech',
        location: 'Shelbyville',
        dates: '2018 - 2020',
        title: 'Engineer',
        bullet_points: ['Maintained the TPS reporting pipeline'],
      },
    ],
    education: [
      { institution: 'State University', degree: 'BSc Computer Science', cgpa: '3.8', dates: '2014 - 2018' },
    ],
    skills: {
      categories: [
        { name: 'Languages', items: ['TypeScript', 'Go'] },
        { name: 'Tools', items: ['Docker'] },
      ],
    },
    certifications: ['Cloud Practitioner'],
    extracurriculars: [
      {
        organization: 'Chess Club',
        position: 'Treasurer',
        dates: '2016 - 2018',
        bullet_points: ['Ran the annual tournament'],
      },
    ],
    projects: [
      {
        name: 'Resume Renderer',
        tech_stack: ['TypeScript', 'docx'],
        bullet_points: ['Renders resumes to Word documents'],
      },
    ],
  };
}
