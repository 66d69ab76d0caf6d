import type { ProjectDefinition, ProjectSource } from "../domain/types.js";

export class InMemoryProjectSource implements ProjectSource {
  private readonly projects: ReadonlyMap<string, ProjectDefinition>;

  constructor(projects: readonly ProjectDefinition[]) {
    this.projects = new Map(projects.map((project) => [project.projectId, project]));
  }

  async getProject(projectId: string): Promise<ProjectDefinition | null> {
    return this.projects.get(projectId) ?? null;
  }
}
