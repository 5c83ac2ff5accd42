/**
 * Pile de priorité indexée par identifiant.
 *
 * - `push()` place un élément au sommet (priorité maximale)
 * - l'itération se fait du sommet vers la base
 * - `remove()` retire un élément quelle que soit sa position, sans réordonner les autres
 */
export class PriorityStack<T extends { readonly id: string }> {
  private readonly items: T[] = [];

  get size(): number {
    return this.items.length;
  }

  /** Empile un élément. Un identifiant déjà présent n'est pas dupliqué. */
  push(item: T): T {
    const existing = this.get(item.id);
    if (existing) return existing;
    this.items.unshift(item);
    return item;
  }

  get(id: string): T | undefined {
    return this.items.find((it) => it.id === id);
  }

  has(id: string): boolean {
    return this.items.some((it) => it.id === id);
  }

  /** Premier élément (depuis le sommet) satisfaisant le prédicat. */
  find(predicate: (item: T) => boolean): T | undefined {
    return this.items.find(predicate);
  }

  /** Retire et retourne l'élément, ou undefined s'il est absent. */
  remove(id: string): T | undefined {
    const idx = this.items.findIndex((it) => it.id === id);
    if (idx < 0) return undefined;
    const [removed] = this.items.splice(idx, 1);
    return removed;
  }

  /** Sommet de la pile. */
  peek(): T | undefined {
    return this.items[0];
  }

  /** Copie du contenu, sommet en premier. */
  toArray(): T[] {
    return this.items.slice();
  }

  clear(): T[] {
    return this.items.splice(0, this.items.length);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.toArray()[Symbol.iterator]();
  }
}
