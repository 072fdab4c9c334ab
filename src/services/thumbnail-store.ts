// Latest thumbnail bytes per entity, as received from the agent.
export class ThumbnailStore {
  private images: Map<string, Buffer> = new Map();

  put(entityId: string, image: Buffer): void {
    this.images.set(entityId, image);
  }

  get(entityId: string): Buffer | undefined {
    return this.images.get(entityId);
  }

  delete(entityId: string): void {
    this.images.delete(entityId);
  }

  /** The ?time= parameter changes on every update so consumers refetch. */
  imageUrl(entityId: string, now: number = Date.now()): string {
    return `/api/hass_agent/${entityId}/thumbnail.png?time=${now / 1000}`;
  }
}
