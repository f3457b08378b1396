/** The single unnamed register: last yanked, deleted or changed text. */
export class Register {
  private value = "";

  get content(): string {
    return this.value;
  }

  isEmpty(): boolean {
    return this.value.length === 0;
  }

  /** Text holding a line terminator pastes line-wise. */
  isLinewise(): boolean {
    return this.value.includes("\n");
  }

  store(text: string) {
    this.value = text;
  }
}
