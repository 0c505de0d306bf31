/**
 * Built-in bringup for a 7-DoF arm with a parallel gripper.
 *
 * Two targets share the common parameters: `moveit` (planning with the
 * visualization UI forced on) and `control` (real-time controllers with
 * visualization forced off).
 */

import { ParameterSchema } from '../parameter-schema.js';
import { Composition, param } from '../types.js';

export const commonParameters = ParameterSchema.declare([
  param('robot_type', 'Type/series of robot.'),
  param('robot_ip', 'IP address by which the robot can be reached.'),
  param(
    'description_package',
    'Description package with robot URDF/XACRO files. Usually the argument is not set, it enables use of a custom description.',
    'kortex_description'
  ),
  param(
    'moveit_config_package',
    'MoveIt configuration package for the robot. Usually the argument is not set, it enables use of a custom config package.',
    'gen3_robotiq_2f_85_move_it_config'
  ),
  param('description_file', 'URDF/XACRO description file with the robot.', 'gen3.xacro'),
  param(
    'prefix',
    'Prefix of the joint names, useful for multi-robot setup. If changed, the joint names in the controllers\' configuration have to be updated too.',
    ''
  ),
  param('gripper', 'Name of the gripper attached to the arm.', 'robotiq_2f_85'),
  param('use_fake_hardware', 'Start robot with fake hardware mirroring command to its states.', false),
  param(
    'fake_sensor_commands',
    'Enable fake command interfaces for sensors used for simple simulations. Used only if \'use_fake_hardware\' is true.',
    false
  ),
], 'common');

export const moveitParameters = ParameterSchema.declare([
  param('moveit_config_file', 'MoveIt SRDF/XACRO description file with the robot.', 'gen3_robotiq_2f_85.srdf.xacro'),
], 'moveit');

export const controlParameters = ParameterSchema.declare([
  param(
    'runtime_config_package',
    'Package with the controller\'s configuration in \'config\' folder. Usually the argument is not set, it enables use of a custom setup.',
    'kortex2_bringup'
  ),
  param('controllers_file', 'YAML file with the controllers configuration.', 'kortex_controllers.yaml'),
  param('robot_controller', 'Robot controller to start.', 'joint_trajectory_controller'),
  param('robot_hand_controller', 'Robot hand controller to start.', 'hand_controller'),
], 'control');

export const visualizationParameters = ParameterSchema.declare([
  param('launch_rviz', 'Start the visualization UI.', false),
], 'visualization');

export const gen3Bringup: Composition = Object.freeze({
  name: 'gen3-bringup',
  description: 'Motion planning and real-time control for a 7-DoF arm with gripper',
  targets: Object.freeze([
    {
      name: 'moveit',
      description: 'Motion planning and visualization',
      schemas: [commonParameters, moveitParameters, visualizationParameters],
      forced: new Map([['launch_rviz', true]]),
      launch: { command: ['ros2', 'launch', 'kortex2_bringup', 'kortex_moveit.launch.py'] },
    },
    {
      name: 'control',
      description: 'Real-time control',
      schemas: [commonParameters, controlParameters, visualizationParameters],
      forced: new Map([['launch_rviz', false]]),
      launch: { command: ['ros2', 'launch', 'kortex2_bringup', 'kortex_control.launch.py'] },
    },
  ]),
});
