export interface ProjectMetadata {
  name: string;
  description: string;
  githubUser: string;
  githubRepo: string;
  masterDoc: string;
  /** Key shared by the Doxygen run and Breathe's project table. */
  breatheProject: string;
}

export const PROJECT: Readonly<ProjectMetadata> = Object.freeze({
  name: 'Observable',
  description: 'Generic observable objects for C++',
  githubUser: 'ddinu',
  githubRepo: 'observable',
  masterDoc: 'index',
  breatheProject: 'observable',
});
