import type { InputDocument, PersonInput } from '../schema.js';

/**
 * A person with a name, salary and skills. Immutable once constructed.
 */
export class Person {
  readonly name: string;
  readonly salary: number;
  readonly skills: readonly string[];

  constructor({ name, salary, skills }: PersonInput) {
    this.name = name;
    this.salary = salary;
    this.skills = Object.freeze([...skills]);
  }

  /**
   * Structural equality: same name, salary and skills in the same order
   */
  equals(other: Person): boolean {
    return (
      this.name === other.name &&
      this.salary === other.salary &&
      this.skills.length === other.skills.length &&
      this.skills.every((skill, i) => skill === other.skills[i])
    );
  }

  /**
   * Orders people by name only
   */
  static compare(a: Person, b: Person): number {
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
  }

  /**
   * Builds the roster from the `Peoples` list, in input order
   */
  static makePeople(data: Pick<InputDocument, 'Peoples'>): Person[] {
    return data.Peoples.map(record => new Person(record));
  }

  toString(): string {
    return `Person Name: ${this.name} Salary: ${this.salary} Skills: ${this.skills.join(', ')}`;
  }
}
