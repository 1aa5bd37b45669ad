/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

export const IMAGE_DESCRIPTION_SYSTEM_PROMPT =
  "You are a helpful assistant trained to analyze a sequence of images from a video clip and describe the user's hand gestures. " +
  "Describe concisely the identified hand gestures in a one-sentence. " +
  "Don't describe the meaning of the gesture, indication, or suggestion of use, nor the user's intention. " +
  "If the user does not perform any gesture, report this. " +
  "Consider the development of the gesture over the sequence of images, not each image individually.";

export const IMAGE_DESCRIPTION_USER_PROMPT =
  "Here are the images in which the user performs none, one single, or two combined hand gestures in sequence. " +
  "Ignore the hands' initial and final resting positions. " +
  "Focus on describing the fingers and hand pose, orientation and direction, and the main movements that characterize the action gestures. " +
  "Include hand interactions with the head parts if they occur.";

export const DOCUMENT_DESCRIPTION_SYSTEM_PROMPT =
  "You are a helpful assistant trained to analyze a sequence of JSON files (i.e., hand pose annotations extracted from a sequence of images using the Google MediaPipe Hands model) from a video clip and describe the user's hand gestures. " +
  "Describe concisely the identified hand gestures in a one-sentence. " +
  "Don't describe the meaning of the gesture, indication, or suggestion of use, nor the user's intention. " +
  "If the user does not perform any gesture, report this. " +
  "Consider the development of the gesture over the sequence of JSON files, not each JSON file individually.";

export const DOCUMENT_DESCRIPTION_USER_PROMPT =
  "Here are hand annotations from a video clip where the user is performing none, one single or two combined hand gestures in sequence. " +
  "Ignore the hands' initial and final resting positions. " +
  "Focus on describing the fingers and hand pose, orientation and direction, and the main movements that characterize the action gestures.";

export const COMMAND_PREDICTION_SYSTEM_PROMPT =
  "You are a helpful assistant trained to interpret a human hand gesture by analyzing its textual description. " +
  "Consider that a system can recognize the user's gesture as a command. " +
  "You should determine the user's intention to use the gesture as a controlling command for a given context or scenario. " +
  "Present a precise label for the identified command (user intention). " +
  "Avoid unnecessary words or special characters, and maintain consistency.";

/** Closed label set of the hybrid-meeting command-prediction variant */
export const MEETING_COMMANDS = [
  "Increase volume",
  "Decrease volume",
  "Mute microphone",
  "Unmute microphone",
  "Turn off camera",
  "Turn on camera",
  "Ask for a question",
  "End call",
] as const;

export const COMMAND_PREDICTION_USER_PROMPT =
  "Here is a description of a user's hand gesture. " +
  "A system can recognize the user's gesture as a controlling command in the given system or application context. " +
  "This gesture refers to commands performed by a user participating in a hybrid meeting. " +
  "Consider that the user is physically in a room and remotely connected to other users through a unified communication platform. " +
  "Evaluate the gesture according to the following options of control commands: " +
  MEETING_COMMANDS.map((command) => `- \`${command}\``).join(" ") +
  ".";
