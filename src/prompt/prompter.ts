/**
 * Yes/no and acknowledgement questions put to the user.
 * `confirm` must settle (false or a rejection) once `signal` aborts.
 */
export interface Prompter {
  confirm(message: string, signal?: AbortSignal): Promise<boolean>;
  alert(message: string): Promise<void>;
}
